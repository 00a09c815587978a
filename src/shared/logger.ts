import path from 'node:path';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { AppConfig, loadConfig } from './config';

export class Logger {
  private logger: winston.Logger;

  constructor(
    context: string,
    config: AppConfig = loadConfig(),
  ) {
    const fileTransports = config.logDir
      ? [
          new winston.transports.File({ filename: path.join(config.logDir, 'error.log'), level: 'error' }),
          new DailyRotateFile({
            dirname: config.logDir,
            filename: 'signals-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            maxSize: '10m',
            maxFiles: '7d',
            zippedArchive: false,
          }),
        ]
      : [];

    this.logger = winston.createLogger({
      level: config.logLevel,
      silent: config.silent,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
      ),
      defaultMeta: { context },
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
        }),
        ...fileTransports,
      ],
    });
  }

  info(message: string, meta?: unknown): void {
    this.logger.info(message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.logger.warn(message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.logger.debug(message, meta);
  }
}
