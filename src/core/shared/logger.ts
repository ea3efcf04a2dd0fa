type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogThreshold = LogLevel | 'silent';

export interface LogMeta {
  requestId?: string;
  sessionId?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const isThreshold = (value: string): value is LogThreshold => value in LEVEL_ORDER;

const resolveThreshold = (): LogThreshold => {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  return configured && isThreshold(configured) ? configured : 'info';
};

const writeLog = (level: LogLevel, message: string, meta: LogMeta = {}): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveThreshold()]) {
    return;
  }

  const payload = {
    ts: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  const line = JSON.stringify(payload);

  if (level === 'error') {
    console.error(line);
    return;
  }

  console.log(line);
};

export const toErrorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

export const logger = {
  debug: (message: string, meta?: LogMeta) => writeLog('debug', message, meta),
  info: (message: string, meta?: LogMeta) => writeLog('info', message, meta),
  warn: (message: string, meta?: LogMeta) => writeLog('warn', message, meta),
  error: (message: string, meta?: LogMeta) => writeLog('error', message, meta),
};
