export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
}

type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /** Bind fields (e.g. `analysisId`) that every entry of the returned logger carries. */
  child(defaults: LogData): Logger;
}

function createLogger(options: LoggerOptions = {}, bound: LogData = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const jsonMode = options.json ?? false;

  function log(level: LogLevel, message: string, data?: LogData) {
    if (LOG_LEVELS[level] < minLevel) return;
    const fields = { ...bound, ...data };
    const hasFields = Object.keys(fields).length > 0;

    if (jsonMode) {
      const entry = { level, message, timestamp: new Date().toISOString(), ...fields };
      process.stderr.write(JSON.stringify(entry) + '\n');
    } else {
      const prefix = level === 'error' ? '\x1b[31m' // red
        : level === 'warn' ? '\x1b[33m' // yellow
        : level === 'debug' ? '\x1b[90m' // grey
        : '';
      const reset = prefix ? '\x1b[0m' : '';
      const dataStr = hasFields ? ` ${JSON.stringify(fields)}` : '';
      process.stderr.write(`${prefix}[${level}]${reset} ${message}${dataStr}\n`);
    }
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    child: (defaults) => createLogger(options, { ...bound, ...defaults }),
  };
}

/** Global logger instance; configure via setLoggerOptions() */
export let logger: Logger = createLogger();

export function setLoggerOptions(options: LoggerOptions): void {
  logger = createLogger(options);
}
