export type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export interface Logger {
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
  debug: LoggerFn;
}

const emit = (level: 'info' | 'warn' | 'error' | 'debug', message: string, context?: LogContext): void => {
  // stdout may carry the graph document (CLI without an output path); logs stay on stderr.
  const log = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    log(message, context);
    return;
  }
  log(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);

export const consoleLogger: Logger = {
  info: logInfo,
  warn: logWarning,
  error: logError,
  debug: logDebug,
};

const noop: LoggerFn = () => undefined;

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};
