// Scoped structured logger
// Writes to stderr so stdout stays free for CLI output and the MCP stdio transport

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

let threshold: LogLevel = (() => {
  const env = process.env.PROSPECT_LOG_LEVEL?.toLowerCase();
  return env && isLogLevel(env) ? env : 'info';
})();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function createLogger(scope: string): Logger {
  function log(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const prefix = `[${scope}:${level.toUpperCase()}]`;
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
