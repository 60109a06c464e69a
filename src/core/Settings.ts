import type { LogLevel } from './types.js';

// Process settings read once from the environment
export interface Settings {
  host: string;
  port: number;
  logLevel: LogLevel;
  strictValidation: boolean; // reject eccentricity outside [0, 1)
}

export type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export class SettingsError extends Error {
  constructor(public readonly variable: string, value: string) {
    super(`Invalid value for ${variable}: "${value}"`);
    this.name = 'SettingsError';
  }
}

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  host: '127.0.0.1',
  port: 5000,
  logLevel: 'info',
  strictValidation: false,
});

function readPort(env: Env): number {
  const raw = env.PORT?.trim();
  if (!raw) return DEFAULT_SETTINGS.port;
  const port = Number(raw);
  if (!/^\d+$/.test(raw) || port > 65_535) throw new SettingsError('PORT', raw);
  return port;
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return DEFAULT_SETTINGS.logLevel;
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) throw new SettingsError('LOG_LEVEL', raw);
  return level;
}

function readFlag(env: Env, variable: string, fallback: boolean): boolean {
  const raw = env[variable]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new SettingsError(variable, raw);
}

export function loadSettings(env: Env = process.env): Settings {
  return {
    host: env.HOST?.trim() || DEFAULT_SETTINGS.host,
    port: readPort(env),
    logLevel: readLogLevel(env),
    strictValidation: readFlag(env, 'ORBIT_STRICT_VALIDATION', DEFAULT_SETTINGS.strictValidation),
  };
}
