/**
 * stderr-only logger for keyscribe.
 *
 * stdout is reserved for user-facing CLI output (including the
 * machine-readable `OUTPUT:` line). All diagnostic output goes to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined): LogLevel | null {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return null;
}

let threshold: LogLevel = parseLogLevel(process.env.KEYSCRIBE_LOG_LEVEL) ?? 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function write(scope: string, level: LogLevel, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }
  process.stderr.write(`[keyscribe:${scope}] ${level.toUpperCase()} ${message}\n`);
}

/**
 * Create a logger whose lines are prefixed with the given component name.
 */
export function createLogger(scope: string): Logger {
  return {
    debug: (message) => write(scope, 'debug', message),
    info: (message) => write(scope, 'info', message),
    warn: (message) => write(scope, 'warn', message),
    error: (message, error) => {
      if (error === undefined) {
        write(scope, 'error', message);
        return;
      }
      const detail = error instanceof Error ? error.message : String(error);
      write(scope, 'error', `${message} - ${detail}`);
    },
  };
}
