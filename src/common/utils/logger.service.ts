import { Injectable, LoggerService } from '@nestjs/common';
import { createLogger, format, Logger as WinstonLogger, transports } from 'winston';
import { join } from 'path';

export interface CustomLoggerOptions {
  level?: string;
  logDir?: string;
}

@Injectable()
export class CustomLogger implements LoggerService {
  private readonly logger: WinstonLogger;

  constructor(options: CustomLoggerOptions = {}) {
    const level = options.level ?? 'info';
    const logDir = options.logDir;

    const sinks = logDir
      ? [
          new transports.Console(),
          new transports.File({ filename: join(logDir, 'error.log'), level: 'error' }),
          new transports.File({ filename: join(logDir, 'combined.log') }),
        ]
      : [new transports.Console()];

    this.logger = createLogger({
      level,
      format: format.combine(format.timestamp(), format.json()),
      transports: sinks,
    });
  }

  log(message: unknown, context?: string) {
    this.logger.info(String(message), { context });
  }

  error(message: unknown, trace?: string, context?: string) {
    this.logger.error(String(message), { trace, context });
  }

  warn(message: unknown, context?: string) {
    this.logger.warn(String(message), { context });
  }

  debug(message: unknown, context?: string) {
    this.logger.debug(String(message), { context });
  }

  verbose(message: unknown, context?: string) {
    this.logger.verbose(String(message), { context });
  }
}
