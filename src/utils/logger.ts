// src/utils/logger.ts
interface LogLevel {
  ERROR: 0;
  WARN: 1;
  INFO: 2;
  DEBUG: 3;
}

export type LogLevelName = keyof LogLevel;
export type LogMeta = Record<string, unknown>;

const LOG_LEVELS: LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3
};

function isLogLevelName(value: string): value is LogLevelName {
  return value in LOG_LEVELS;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevelName = 'WARN'): LogLevelName {
  const normalized = (value ?? '').trim().toUpperCase();
  return isLogLevelName(normalized) ? normalized : fallback;
}

export class Logger {
  private level: number;

  constructor(level: LogLevelName = 'WARN') {
    this.level = LOG_LEVELS[level];
  }

  setLevel(level: LogLevelName) {
    this.level = LOG_LEVELS[level];
  }

  isEnabled(level: LogLevelName): boolean {
    return LOG_LEVELS[level] <= this.level;
  }

  private log(level: LogLevelName, message: string, meta?: LogMeta) {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] ${level}: ${message}`;

    // stdout belongs to the story; every log line goes to stderr
    if (level === 'ERROR') {
      console.error(line, meta ?? '');
    } else if (level === 'WARN') {
      console.warn(line, meta ?? '');
    } else {
      console.error(line, meta ?? '');
    }
  }

  error(message: string, meta?: LogMeta) {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    this.log('DEBUG', message, meta);
  }
}

export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));
