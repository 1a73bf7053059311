import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig } from '../connections/config/app.config';

/**
 * Size-based ("10MB") or daily ("1 day") rotation for the file transports
 */
export const parseRotation = (rotation: string): { maxSize?: string; datePattern?: string } => {
  if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
    return { maxSize: rotation };
  } else if (rotation.includes('day') || rotation.includes('hour')) {
    return { datePattern: rotation.includes('hour') ? 'YYYY-MM-DD-HH' : 'YYYY-MM-DD' };
  }
  return { maxSize: '10MB' };
};

// "30 days" -> "30d", "12 hours" -> "12h"
export const parseRetention = (retention: string): string => {
  const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
  if (match) {
    const num = match[1];
    const unit = match[2].toLowerCase();
    if (unit.startsWith('d')) return `${num}d`;
    if (unit.startsWith('h')) return `${num}h`;
  }
  return '30d';
};

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private fileLogging: boolean;

  constructor() {
    this.logLevel = appConfig.logLevel;
    this.rotation = appConfig.logRotation;
    this.retention = appConfig.logRetention;
    this.compression = true;
    this.logDir = path.resolve(appConfig.logDir);

    // Test runs only log to a silenced console
    this.fileLogging = appConfig.nodeEnv !== 'test';

    if (this.fileLogging && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = stack ? `\n${stackPrefix}${String(stack)}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf(info => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(info => this.formatLine(info, 'Stack: '))
    );
  }

  private createFileTransport(name: string, level?: string): DailyRotateFile {
    const rotationConfig = parseRotation(this.rotation);

    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: parseRetention(this.retention),
      zippedArchive: this.compression,
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
      silent: !this.fileLogging,
    }));

    if (this.fileLogging) {
      logger.add(this.createFileTransport('sys'));
      logger.add(this.createFileTransport('error', 'error'));
      logger.add(this.createFileTransport('combined', 'silly'));
    }

    return logger;
  }
}

const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

/**
 * Child logger tagged with the module name
 */
export const getLogger = (name: string): winston.Logger => logger.child({ name });

