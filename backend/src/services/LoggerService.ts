import fs from 'fs';
import path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50
};

const SILENT = Number.POSITIVE_INFINITY;

function thresholdFromEnv(): number {
  if (process.env.DEBUG?.toLowerCase() === 'true') {
    return LEVEL_ORDER[LogLevel.DEBUG];
  }
  switch ((process.env.LOG_LEVEL || 'info').toLowerCase()) {
    case 'debug':
      return LEVEL_ORDER[LogLevel.DEBUG];
    case 'warn':
      return LEVEL_ORDER[LogLevel.WARN];
    case 'error':
      return LEVEL_ORDER[LogLevel.ERROR];
    case 'silent':
      return SILENT;
    default:
      return LEVEL_ORDER[LogLevel.INFO];
  }
}

export class LoggerService {
  private context: string;
  private threshold: number;
  private logFile: string | null;

  constructor(context: string = 'App') {
    this.context = context;
    this.threshold = thresholdFromEnv();

    const logDir = process.env.LOG_DIR;
    if (logDir) {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.logFile = path.join(logDir, `chat-${new Date().toISOString().split('T')[0]}.log`);
    } else {
      this.logFile = null;
    }
  }

  child(context: string): LoggerService {
    return new LoggerService(`${this.context}:${context}`);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }

  formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    const formattedMeta = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `[${timestamp}] [${level}] [${this.context}] ${message}${formattedMeta}`;
  }

  private write(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.isEnabled(level)) return;
    const line = this.formatMessage(level, message, meta);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.error(line);
    }

    if (this.logFile) {
      fs.appendFileSync(this.logFile, `${line}\n`);
    }
  }

  debug(message: string, meta?: LogMeta): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    this.write(LogLevel.ERROR, message, withError(error, meta));
  }

  fatal(message: string, error?: unknown, meta?: LogMeta): void {
    this.write(LogLevel.FATAL, message, withError(error, meta));
  }

  getLogPath(): string | null {
    return this.logFile;
  }
}

function withError(error: unknown, meta?: LogMeta): LogMeta | undefined {
  if (error === undefined) return meta;
  if (error instanceof Error) {
    return { ...meta, errorMessage: error.message, stack: error.stack };
  }
  return { ...meta, errorMessage: String(error) };
}
