type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogData = Record<string, unknown>;

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in levels;
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

function log(level: LogLevel, message: string, data?: LogData) {
  if (levels[level] < levels[currentLevel]) return;
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...data,
  };
  if (level === 'error') {
    console.error(JSON.stringify(entry));
  } else {
    console.log(JSON.stringify(entry));
  }
}

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
}

function scoped(base: LogData): Logger {
  return {
    debug: (msg, data) => log('debug', msg, { ...base, ...data }),
    info: (msg, data) => log('info', msg, { ...base, ...data }),
    warn: (msg, data) => log('warn', msg, { ...base, ...data }),
    error: (msg, data) => log('error', msg, { ...base, ...data }),
  };
}

export const logger = scoped({});

/** Logger whose entries all carry the given call's SID. */
export function callLogger(callSid: string): Logger {
  return scoped({ callSid });
}

/** Flattens an unknown thrown value into loggable fields. */
export function errorFields(err: unknown): LogData {
  if (err instanceof Error) {
    const fields: LogData = { error: err.message, errorName: err.name };
    if ('code' in err && typeof err.code === 'string') fields.errorCode = err.code;
    return fields;
  }
  return { error: String(err) };
}
