import type { Logger } from '@/core/Logger';
import { DEFAULT_SETTINGS } from '@/core/Settings';
import { startServer } from '@/server/startServer';
import { describe, expect, it, vi } from 'vitest';

function fakeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('startServer', () => {
  it('listens on an ephemeral port, serves requests and closes', async () => {
    const logger = fakeLogger();
    const running = await startServer({ ...DEFAULT_SETTINGS, port: 0 }, logger);
    expect(running.port).toBeGreaterThan(0);
    expect(logger.info).toHaveBeenCalledWith('server_started', {
      host: '127.0.0.1',
      port: running.port,
      strictValidation: false,
    });

    const res = await fetch(`http://127.0.0.1:${running.port}/calculate?semi_major_axis=7000&eccentricity=0.01`);
    expect(res.status).toBe(200);
    await res.arrayBuffer();

    await running.close();
    expect(running.server.listening).toBe(false);
    expect(logger.info).toHaveBeenLastCalledWith('server_stopped', { port: running.port });
  });

  it('passes strict validation through to the route', async () => {
    const running = await startServer({ ...DEFAULT_SETTINGS, port: 0, strictValidation: true }, fakeLogger());
    try {
      const res = await fetch(`http://127.0.0.1:${running.port}/calculate?semi_major_axis=7000&eccentricity=2`);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Eccentricity must be in [0, 1)' });
    } finally {
      await running.close();
    }
  });

  it('rejects when the port is already taken', async () => {
    const first = await startServer({ ...DEFAULT_SETTINGS, port: 0 }, fakeLogger());
    try {
      await expect(startServer({ ...DEFAULT_SETTINGS, port: first.port }, fakeLogger())).rejects.toThrow(/EADDRINUSE/);
    } finally {
      await first.close();
    }
  });
});
