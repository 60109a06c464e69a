import type { Server } from 'node:http';
import type { Logger } from '../core/Logger.js';
import type { Settings } from '../core/Settings.js';
import { createApp } from './app.js';

export interface RunningServer {
  server: Server;
  port: number; // actual port, useful when Settings.port is 0
  close(): Promise<void>;
}

export function startServer(settings: Settings, logger: Logger): Promise<RunningServer> {
  const app = createApp({ logger, strictValidation: settings.strictValidation });

  return new Promise((resolve, reject) => {
    const server = app.listen(settings.port, settings.host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      const address = server.address();
      const port = address !== null && typeof address === 'object' ? address.port : settings.port;
      logger.info('server_started', { host: settings.host, port, strictValidation: settings.strictValidation });

      resolve({
        server,
        port,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => {
              if (err) {
                fail(err);
                return;
              }
              logger.info('server_stopped', { port });
              done();
            });
          }),
      });
    });
  });
}
