import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import * as path from 'path';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export interface LoggerOptions {
  level: string;
  logDir: string;
  /** Pretty console output and no file transports */
  development: boolean;
}

const SENSITIVE_KEYS = ['password', 'token', 'authorization', 'secret', 'databaseurl'];

export function redact(value: unknown): unknown {
  if (typeof value !== 'object' || value === null) return value;
  if (Array.isArray(value)) return value.map(redact);

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lowerKey = key.toLowerCase().replace(/_/g, '');
    result[key] = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))
      ? '[REDACTED]'
      : redact(entry);
  }
  return result;
}

const sensitiveFilter = winston.format(info => {
  if (info.context !== undefined) info.context = redact(info.context);
  return info;
});

/**
 * Nest logger backed by winston. Framework and service loggers
 * (`new Logger(Context.name)`) are routed here once it is installed
 * with `app.useLogger`.
 */
@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly logger: winston.Logger;

  constructor(options: LoggerOptions) {
    const prettyPrint = winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
      const contextStr = context ? ` [${typeof context === 'string' ? context : JSON.stringify(context)}]` : '';
      const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} [${level.toUpperCase()}]${contextStr}: ${message}${metaStr}`;
    });

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          sensitiveFilter(),
          options.development ? prettyPrint : winston.format.json(),
        ),
      }),
    ];

    if (!options.development) {
      const fileFormat = winston.format.combine(
        winston.format.timestamp(),
        sensitiveFilter(),
        winston.format.json(),
      );

      transports.push(
        new DailyRotateFile({
          filename: path.join(options.logDir, 'application-%DATE%.log'),
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: '20m',
          maxFiles: '14d',
          format: fileFormat,
        }),
        new DailyRotateFile({
          filename: path.join(options.logDir, 'error-%DATE%.log'),
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: '20m',
          maxFiles: '30d',
          level: 'error',
          format: fileFormat,
        }),
      );
    }

    this.logger = winston.createLogger({ level: options.level, transports });
  }

  private formatMessage(message: unknown): string {
    if (message instanceof Error) return message.message;
    if (typeof message === 'object' && message !== null) return JSON.stringify(message);
    return String(message);
  }

  /**
   * Nest passes the context as the last optional parameter; anything before
   * it is extra detail (for `error`, usually the stack).
   */
  private split(optionalParams: unknown[]): { context?: string; details: unknown[] } {
    if (optionalParams.length === 0) return { details: [] };
    const last = optionalParams[optionalParams.length - 1];
    if (typeof last === 'string') {
      const details = optionalParams.slice(0, -1).filter(detail => detail !== undefined);
      return { context: last, details };
    }
    return { details: optionalParams };
  }

  private write(level: string, message: unknown, optionalParams: unknown[]): void {
    const { context, details } = this.split(optionalParams);
    const meta: Record<string, unknown> = {};
    if (context) meta.context = context;
    if (details.length > 0) meta.details = details.map(detail => redact(detail));
    if (message instanceof Error) meta.stack = message.stack;
    this.logger.log({ level, message: this.formatMessage(message), ...meta });
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('verbose', message, optionalParams);
  }
}
