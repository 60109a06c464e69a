import type { LogLevel } from './types.js';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// Errors don't survive JSON.stringify; keep name and message only
function serialize(fields: LogFields): LogFields {
  const out: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

/**
 * One JSON line per entry on the console method of the same level.
 * Entries below `level` are dropped.
 */
export function createLogger(level: LogLevel, now: () => Date = () => new Date()): Logger {
  const emit = (entryLevel: EmittingLevel, event: string, fields: LogFields = {}) => {
    if (SEVERITY[entryLevel] < SEVERITY[level]) return;
    const line = JSON.stringify({
      level: entryLevel,
      event,
      time: now().toISOString(),
      ...serialize(fields),
    });
    console[entryLevel](line);
  };

  return {
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
  };
}
