import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig, logConfig } from '../connections/config/app.config';

class LoggingConfig {
  private logLevel: string;
  private rotationSize: string;
  private retention: string;
  private logDir: string;
  private silent: boolean;

  constructor() {
    this.logLevel = logConfig.level;
    this.rotationSize = logConfig.rotationSize;
    this.retention = logConfig.retention;
    this.logDir = logConfig.dir ? path.resolve(logConfig.dir) : '';
    this.silent = appConfig.nodeEnv === 'test';
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = typeof stack === 'string' ? `\n${stackPrefix}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => this.formatLine(info, 'Stack: '))
    );
  }

  private createFileTransport(name: string, level?: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.rotationSize,
      maxFiles: this.retention,
      zippedArchive: true,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
      silent: this.silent,
    }));

    if (this.logDir && !this.silent) {
      if (!fs.existsSync(this.logDir)) {
        fs.mkdirSync(this.logDir, { recursive: true });
      }

      logger.add(this.createFileTransport('sys'));
      logger.add(this.createFileTransport('error', 'error'));
    }

    return logger;
  }
}

export const logger = new LoggingConfig().setupLogging();

/**
 * Security-relevant events (registration, login, role-gated mutations)
 */
export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}
