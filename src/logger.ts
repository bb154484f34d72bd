import { env } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function enabled(level: LogLevel): boolean {
  return RANK[level] >= RANK[env.LOG_LEVEL];
}

// One JSON object per line. Callers pass identifiers only, never tokens or customer contact data.
function write(level: LogLevel, event: string, meta: Record<string, unknown>): void {
  if (!enabled(level)) return;
  const line = JSON.stringify({ level, event, time: new Date().toISOString(), ...meta });
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function logDebug(event: string, meta: Record<string, unknown> = {}): void {
  write('debug', event, meta);
}

export function logInfo(event: string, meta: Record<string, unknown> = {}): void {
  write('info', event, meta);
}

export function logWarn(event: string, meta: Record<string, unknown> = {}): void {
  write('warn', event, meta);
}

export function logError(event: string, meta: Record<string, unknown> = {}): void {
  write('error', event, meta);
}

// Flattens an unknown thrown value into loggable fields.
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name };
  }
  return { error: String(err) };
}
