//scoped console logger: "[scope] message", filtered by LOG_LEVEL
import { env, type LogLevel } from './config/env.js';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export function createLogger(scope: string, level: LogLevel = env.LOG_LEVEL): Logger {
  const enabled = (l: LogLevel) => LEVELS[l] >= LEVELS[level];
  const prefix = `[${scope}]`;
  //diagnostics go to stderr so stdout stays reserved for the run output JSON
  return {
    debug: (m, ...meta) => { if (enabled('debug')) console.error(prefix, m, ...meta); },
    info: (m, ...meta) => { if (enabled('info')) console.error(prefix, m, ...meta); },
    warn: (m, ...meta) => { if (enabled('warn')) console.warn(prefix, m, ...meta); },
    error: (m, ...meta) => { if (enabled('error')) console.error(prefix, m, ...meta); },
  };
}
