/**
 * Logging for cells and the CLI.
 *
 * Each entry is a single JSON object on its own line. Errors go to stderr,
 * everything else to stdout. `LOG_LEVEL` is consulted per entry.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  time: string;
  level: LogLevel;
  component: string;
  message: string;
  [field: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

function threshold(): LogLevel {
  const configured = process.env['LOG_LEVEL'];
  return isLogLevel(configured) ? configured : 'info';
}

function enabled(level: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[threshold()];
}

export function log(level: LogLevel, component: string, message: string, fields?: Record<string, unknown>): void {
  if (!enabled(level)) return;

  // Fixed keys win over caller fields
  const entry: LogEntry = { ...fields, time: new Date().toISOString(), level, component, message };
  const stream = level === 'error' ? process.stderr : process.stdout;
  stream.write(`${JSON.stringify(entry)}\n`);
}

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export function createLogger(component: string): Logger {
  const at = (level: LogLevel) => (message: string, fields?: Record<string, unknown>) =>
    log(level, component, message, fields);
  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}
