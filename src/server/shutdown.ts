import type { Logger } from '../core/Logger.js';
import type { RunningServer } from './startServer.js';

const SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

// The part of `process` used here; tests pass an EventEmitter
export interface SignalSource {
  once(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

// Close the server on the first SIGINT or SIGTERM; later signals are ignored
export function handleShutdownSignals(
  running: Pick<RunningServer, 'close'>,
  logger: Logger,
  onFailure: () => void,
  signals: SignalSource = process
): void {
  let closing = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    logger.info('shutdown_requested', { signal });
    running.close().catch((error: unknown) => {
      logger.error('shutdown_failed', { error });
      onFailure();
    });
  };
  for (const signal of SIGNALS) signals.once(signal, shutdown);
}
