/**
 * Structured JSON logger. One object per line on stdout (stderr for errors),
 * with consistent fields so log drains can filter by hub, ticket or actor.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  hubId?: string;
  ticketId?: string;
  actorId?: string;
  durationMs?: number;
  error?: {
    code?: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

export type LogSink = (entry: LogEntry) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_PRIORITY;
}

const envLevel = process.env.LOG_LEVEL;
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

function writeToStdio(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

let sink: LogSink = writeToStdio;

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/** Redirect log output; pass nothing to restore stdout/stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? writeToStdio;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function log(level: LogLevel, message: string, fields?: Partial<LogEntry>): void {
  if (!shouldLog(level)) return;
  sink({
    ...fields,
    timestamp: new Date().toISOString(),
    level,
    message,
  });
}

/** Shape an unknown thrown value into the `error` field of a log entry. */
export function serializeError(err: unknown): NonNullable<LogEntry['error']> {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { code, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}

export const logger = {
  debug: (message: string, fields?: Partial<LogEntry>) => log('debug', message, fields),
  info: (message: string, fields?: Partial<LogEntry>) => log('info', message, fields),
  warn: (message: string, fields?: Partial<LogEntry>) => log('warn', message, fields),
  error: (message: string, fields?: Partial<LogEntry>) => log('error', message, fields),
};
