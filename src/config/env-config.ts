export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVEL_ENV = 'DIALECT_RELAY_LOG_LEVEL';
export const STREAM_CAPACITY_ENV = 'DIALECT_RELAY_STREAM_CAPACITY';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
export const DEFAULT_STREAM_CAPACITY = 100;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = String(env[LOG_LEVEL_ENV] ?? '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

/** Event-channel capacity for stream transcoders; invalid values fall back to the default. */
export function resolveStreamCapacity(env: NodeJS.ProcessEnv = process.env): number {
  const raw = String(env[STREAM_CAPACITY_ENV] ?? '').trim();
  if (!/^\d+$/.test(raw)) {
    return DEFAULT_STREAM_CAPACITY;
  }
  const parsed = Number.parseInt(raw, 10);
  return parsed > 0 ? parsed : DEFAULT_STREAM_CAPACITY;
}

export function logLevelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}
