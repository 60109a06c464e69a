// Entry point for the orbit calculator HTTP service
import { createLogger } from './core/Logger.js';
import { loadSettings, SettingsError, type Settings } from './core/Settings.js';
import { handleShutdownSignals } from './server/shutdown.js';
import { startServer } from './server/startServer.js';

function readSettings(): Settings | null {
  try {
    return loadSettings();
  } catch (error) {
    if (!(error instanceof SettingsError)) throw error;
    createLogger('error').error('invalid_settings', { variable: error.variable, error });
    return null;
  }
}

async function main(): Promise<void> {
  const settings = readSettings();
  if (!settings) {
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(settings.logLevel);
  const running = await startServer(settings, logger);

  handleShutdownSignals(running, logger, () => {
    process.exitCode = 1;
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exitCode = 1;
});
