export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

type EmittingLevel = Exclude<LogLevel, 'silent'>;

function consoleMethod(level: EmittingLevel): typeof console.log {
  switch (level) {
    case 'debug':
      return console.debug;
    case 'info':
      return console.log;
    case 'warn':
      return console.warn;
    case 'error':
      return console.error;
  }
}

export function formatLine(scope: string, message: string, context?: Record<string, unknown>): string {
  let line = `[${scope}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    line += ` ${JSON.stringify(context)}`;
  }
  return line;
}

/**
 * Console logger with a `[scope]` prefix on every line.
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const emit = (lvl: EmittingLevel, message: string, context?: Record<string, unknown>) => {
    if (LEVEL_PRIORITY[lvl] < LEVEL_PRIORITY[level]) return;
    consoleMethod(lvl)(formatLine(scope, message, context));
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context)
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
