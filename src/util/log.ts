export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  // eslint-disable-next-line no-console
  console[level](line);
};

function normaliseFields(fields: LogFields): LogFields {
  const result: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return result;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * One JSON line per entry: timestamp, level, scope, message, then fields.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const sink = options.sink ?? consoleSink;
  const scope = options.scope;

  const write = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    const payload = {
      timestamp: new Date().toISOString(),
      level,
      ...(scope ? { scope } : {}),
      message,
      ...(fields ? normaliseFields(fields) : {}),
    };
    sink(level, JSON.stringify(payload));
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (childScope) =>
      createLogger({
        level: options.level,
        sink,
        scope: scope ? `${scope}.${childScope}` : childScope,
      }),
  };
}

export const silentLogger: Logger = createLogger({ sink: () => undefined });
