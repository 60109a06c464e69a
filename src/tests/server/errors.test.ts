import type { Server } from 'node:http';
import type { Logger } from '@/core/Logger';
import { BadRequestError, errorHandler, HttpError, MethodNotAllowedError } from '@/server/errors';
import express from 'express';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';

describe('errorHandler', () => {
  const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.get('/boom', () => {
      throw new Error('connection reset by upstream');
    });
    app.get('/teapot', () => {
      throw new HttpError(418, 'No coffee here');
    });
    app.get('/bad', () => {
      throw new BadRequestError('Nope');
    });
    app.get('/locked', () => {
      throw new MethodNotAllowedError(['GET']);
    });
    app.use(errorHandler(logger));

    await new Promise<void>((resolve, reject) => {
      server = app.listen(0, '127.0.0.1');
      server.once('error', reject);
      server.once('listening', () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('expected a TCP address'));
          return;
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
        resolve();
      });
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });

  it('maps unexpected errors to a generic 500 and logs them', async () => {
    const res = await fetch(`${baseUrl}/boom`);
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error' });
    expect(logger.error).toHaveBeenCalledWith('request_failed', {
      method: 'GET',
      path: '/boom',
      error: expect.any(Error),
    });
  });

  it('uses the status and message of an HttpError', async () => {
    const res = await fetch(`${baseUrl}/teapot`);
    expect(res.status).toBe(418);
    expect(await res.json()).toEqual({ error: 'No coffee here' });
  });

  it('maps BadRequestError to 400', async () => {
    const res = await fetch(`${baseUrl}/bad`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Nope' });
  });

  it('sets Allow for MethodNotAllowedError', async () => {
    const res = await fetch(`${baseUrl}/locked`);
    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('GET');
    expect(await res.json()).toEqual({ error: 'Method not allowed' });
  });
});
