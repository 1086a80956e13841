/**
 * Structured JSON logger writing one line per entry to the console
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Never written out, whatever component logs them
const REDACTED_KEYS = new Set([
  'accessToken',
  'refreshToken',
  'appSecret',
  'clientSecret',
  'password',
  'authorization',
  'code',
]);

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

function redact(fields: LogFields): LogFields {
  const out: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = REDACTED_KEYS.has(key) ? '[redacted]' : serializeValue(value);
  }
  return out;
}

export interface LoggerOptions {
  level?: LogLevel;
  bindings?: LogFields;
  // Defaults to console; tests pass a collector
  sink?: (level: LogLevel, line: string) => void;
}

function consoleSink(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const bindings = options.bindings ?? {};
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, msg: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    sink(
      level,
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        msg,
        ...redact({ ...bindings, ...fields }),
      })
    );
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (childBindings) =>
      createLogger({ ...options, bindings: { ...bindings, ...childBindings } }),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = createLogger({ sink: () => undefined });
