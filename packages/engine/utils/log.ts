// Scoped structured logger. Writes to stderr so stdout stays free for
// command output and the MCP stdio transport.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'info';
}

export function createLogger(scope: string, level: LogLevel = envLevel()): Logger {
  const threshold = LEVEL_ORDER[level];

  function log(at: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[at] < threshold) return;
    const prefix = `[${scope}:${at.toUpperCase()}]`;
    if (data) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
