import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@config/config.service';
import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

function toText(message: unknown): string {
  if (typeof message === 'string') return message;
  if (message instanceof Error) return message.message;
  return JSON.stringify(message);
}

/**
 * Nest logger backed by winston. Console always; daily files under logs/ when LOG_TO_FILE is set.
 */
@Injectable()
export class CustomLoggerService implements LoggerService {
  private winstonLogger: winston.Logger;
  private readonly logDirectory: string;
  private context = 'CustomLogger';

  constructor(private readonly configService: ConfigService) {
    this.logDirectory = path.join(process.cwd(), 'logs');
    this.winstonLogger = this.createWinstonLogger();
  }

  /**
   * Build the winston logger with console and optional file transports
   */
  private createWinstonLogger(): winston.Logger {
    const logLevel = this.configService.getLogLevel();

    // Custom format for log files
    const fileFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, context, stack, ...meta }) => {
        const contextStr = context ? `[${context}] ` : '';
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        const stackStr = stack ? `\n${stack}` : '';
        return `${timestamp} [${level.toUpperCase()}] ${contextStr}${message}${metaStr}${stackStr}`;
      }),
    );

    // Console format with colors
    const consoleFormat = winston.format.combine(
      winston.format.colorize({ all: true }),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.printf(({ timestamp, level, message, context, stack, ...meta }) => {
        const contextStr = context ? `[${context}] ` : '';
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        const stackStr = stack ? `\n${stack}` : '';
        return `${timestamp} ${level} ${contextStr}${message}${metaStr}${stackStr}`;
      }),
    );

    const transports: winston.transport[] = [
      new winston.transports.Console({
        level: logLevel,
        format: consoleFormat,
      }),
    ];

    if (this.configService.logToFile) {
      // logs/YYYY-MM-DD/
      const today = new Date().toISOString().split('T')[0];
      const dailyLogDirectory = path.join(this.logDirectory, today);
      fs.mkdirSync(dailyLogDirectory, { recursive: true });

      transports.push(
        new winston.transports.File({
          filename: path.join(dailyLogDirectory, 'combined.log'),
          level: logLevel,
          format: fileFormat,
        }),
        new winston.transports.File({
          filename: path.join(dailyLogDirectory, 'error.log'),
          level: 'error',
          format: fileFormat,
        }),
      );
    }

    return winston.createLogger({
      level: logLevel,
      transports,
      exitOnError: false,
    });
  }

  log(message: unknown, context?: string): void {
    this.winstonLogger.info(toText(message), { context: context || this.context });
  }

  /**
   * Log an error message, with the stack when Nest passes one
   */
  error(message: unknown, stack?: string, context?: string): void {
    const contextName = context || this.context;

    if (stack) {
      this.winstonLogger.error(toText(message), { context: contextName, stack });
    } else if (message instanceof Error) {
      this.winstonLogger.error(message.message, { context: contextName, stack: message.stack });
    } else {
      this.winstonLogger.error(toText(message), { context: contextName });
    }
  }

  warn(message: unknown, context?: string): void {
    this.winstonLogger.warn(toText(message), { context: context || this.context });
  }

  debug(message: unknown, context?: string): void {
    this.winstonLogger.debug(toText(message), { context: context || this.context });
  }

  verbose(message: unknown, context?: string): void {
    this.winstonLogger.verbose(toText(message), { context: context || this.context });
  }

  /**
   * Log application startup information
   */
  logStartupInfo(port: number, environment: string): void {
    this.log('='.repeat(60), this.context);
    this.log('BITCOIN EXPORTER STARTED', this.context);
    this.log('='.repeat(60), this.context);
    this.log(`Port: ${port}`, this.context);
    this.log(`Environment: ${environment}`, this.context);
    this.log(`Log Level: ${this.winstonLogger.level}`, this.context);
    if (this.configService.logToFile) {
      this.log(`Logs Directory: ${this.logDirectory}`, this.context);
    }
    this.log(`Started at: ${new Date().toISOString()}`, this.context);
    this.log('='.repeat(60), this.context);
  }

  /**
   * Log application shutdown information
   */
  logShutdownInfo(): void {
    this.log('='.repeat(60), this.context);
    this.log('BITCOIN EXPORTER SHUTTING DOWN', this.context);
    this.log(`Shutdown at: ${new Date().toISOString()}`, this.context);
    this.log('='.repeat(60), this.context);
  }
}
