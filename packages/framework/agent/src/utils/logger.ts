export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogThreshold = LogLevel | 'silent';

interface LogEntry {
  level: LogLevel;
  scope: string | undefined;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string): value is LogThreshold {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function currentThreshold(): LogThreshold {
  const configured = process.env['TURNKIT_LOG_LEVEL']?.toLowerCase();
  return configured !== undefined && isThreshold(configured) ? configured : 'info';
}

function formatLog(entry: LogEntry): string {
  const scope = entry.scope ? ` [${entry.scope}]` : '';
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}${scope}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function write(
  level: LogLevel,
  scope: string | undefined,
  message: string,
  data?: Record<string, unknown>
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentThreshold()]) {
    return;
  }
  const line = formatLog({ level, scope, message, timestamp: new Date().toISOString(), data });
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

/**
 * Create a logger whose lines carry a scope tag, e.g. `[supervisor]`.
 * The minimum level comes from TURNKIT_LOG_LEVEL (default: info).
 */
export function createLogger(scope?: string): Logger {
  return {
    debug: (message, data) => write('debug', scope, message, data),
    info: (message, data) => write('info', scope, message, data),
    warn: (message, data) => write('warn', scope, message, data),
    error: (message, data) => write('error', scope, message, data),
  };
}

export const logger = createLogger();

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
