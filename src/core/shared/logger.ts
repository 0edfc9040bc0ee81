type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMeta {
  requestId?: string;
  sessionId?: string;
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const resolveThreshold = (): number => {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();

  switch (configured) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return LEVEL_RANK[configured];
    default:
      return LEVEL_RANK.info;
  }
};

const threshold = resolveThreshold();

const writeLog = (level: LogLevel, message: string, meta: LogMeta = {}): void => {
  if (LEVEL_RANK[level] < threshold) {
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

export const logger = {
  debug: (message: string, meta?: LogMeta) => writeLog('debug', message, meta),
  info: (message: string, meta?: LogMeta) => writeLog('info', message, meta),
  warn: (message: string, meta?: LogMeta) => writeLog('warn', message, meta),
  error: (message: string, meta?: LogMeta) => writeLog('error', message, meta),
};
