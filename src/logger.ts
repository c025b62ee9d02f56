export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

/**
 * Tagged console logger. Everything goes to stderr so stdout stays free for
 * scan results.
 */
export function createLogger(tag: string, level: LogLevel = 'info'): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) {
      return;
    }
    const line = `[${tag}] ${at}: ${message}`;
    if (meta) {
      console.error(line, meta);
    } else {
      console.error(line);
    }
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta)
  };
}
