/**
 * Tagged console logger for the safety core.
 *
 * Lines look like `[SafetyPipeline] Scan completed {"risk_level":"SAFE"}`.
 * Callers pass identifiers and hashes only; raw message text and student
 * references never reach a log line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value || '').toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    case 'silent':
      return 'silent';
    default:
      return 'info';
  }
}

let activeLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

function serializeData(data: Record<string, unknown>): string {
  try {
    return JSON.stringify(data, (_key, value: unknown) => {
      if (value instanceof Error) {
        return { name: value.name, message: value.message };
      }
      return value;
    });
  } catch {
    return '"[unserializable]"';
  }
}

function write(level: Exclude<LogLevel, 'silent'>, tag: string, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[activeLevel]) {
    return;
  }

  const line = data ? `[${tag}] ${message} ${serializeData(data)}` : `[${tag}] ${message}`;

  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
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
 * Create a logger bound to a component tag.
 */
export function createLogger(tag: string): Logger {
  return {
    debug: (message, data) => write('debug', tag, message, data),
    info: (message, data) => write('info', tag, message, data),
    warn: (message, data) => write('warn', tag, message, data),
    error: (message, data) => write('error', tag, message, data)
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
