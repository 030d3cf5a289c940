import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { config } from '../config/environment';

export type LogContext = Record<string, unknown>;

// Log levels configuration
const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Log colors for console output
const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(logColors);

const logsDir = path.join(process.cwd(), 'logs');

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `${String(timestamp)} [${level}]: ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta, null, 2)}`;
    }
    return log;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    level: config.nodeEnv === 'development' ? 'debug' : 'info',
    silent: config.nodeEnv === 'test',
  }),
];

if (config.logging.toFile) {
  transports.push(
    // Error log file (daily rotation)
    new DailyRotateFile({
      filename: path.join(logsDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '30d',
      zippedArchive: true,
    }),

    // Combined log file (daily rotation)
    new DailyRotateFile({
      filename: path.join(logsDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '14d',
      zippedArchive: true,
    }),

    // Security events log file (daily rotation)
    new DailyRotateFile({
      filename: path.join(logsDir, 'security-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      zippedArchive: true,
    })
  );
}

export const logger = winston.createLogger({
  levels: logLevels,
  level: config.logging.level,
  format: logFormat,
  transports,
});

/**
 * Minimal view of a connection used when logging socket traffic.
 */
export interface LoggedConnection {
  id: string;
  username?: string;
}

// Logging service class for structured logging
export class LoggingService {
  private static instance: LoggingService;

  private constructor() {}

  static getInstance(): LoggingService {
    if (!LoggingService.instance) {
      LoggingService.instance = new LoggingService();
    }
    return LoggingService.instance;
  }

  // Socket event logging
  logSocketEvent(eventName: string, connection: LoggedConnection, data: unknown, duration?: number, error?: unknown): void {
    const logData = {
      event: eventName,
      socketId: connection.id,
      username: connection.username || 'anonymous',
      data: data !== undefined ? JSON.stringify(data).substring(0, 500) : undefined,
      duration: duration !== undefined ? `${duration.toFixed(2)}ms` : undefined,
      error: error ? (error instanceof Error ? error.message : String(error)) : undefined,
      timestamp: new Date().toISOString(),
    };

    if (error) {
      logger.error('Socket Event Error', logData);
    } else if (duration !== undefined && duration > 1000) {
      logger.warn('Slow Socket Event', logData);
    } else {
      logger.debug('Socket Event', logData);
    }
  }

  // HTTP request logging
  logHttpRequest(method: string, url: string, statusCode: number, duration: number, ip?: string): void {
    const logData = {
      method,
      url,
      statusCode,
      duration: `${duration}ms`,
      ip,
      timestamp: new Date().toISOString(),
    };

    if (statusCode >= 500) {
      logger.error('HTTP Request', logData);
    } else if (statusCode >= 400) {
      logger.warn('HTTP Request', logData);
    } else {
      logger.http('HTTP Request', logData);
    }
  }

  // Security event logging
  logSecurityEvent(event: string, details: LogContext, level: 'info' | 'warn' | 'error' = 'info'): void {
    const logData = {
      securityEvent: event,
      ...details,
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
    };

    switch (level) {
      case 'error':
        logger.error('Security Event', logData);
        break;
      case 'warn':
        logger.warn('Security Event', logData);
        break;
      default:
        logger.info('Security Event', logData);
    }
  }

  // Validation failure logging
  logValidationFailure(event: string, data: unknown, errors: string[]): void {
    this.logSecurityEvent('Validation Failure', {
      event,
      data: JSON.stringify(data ?? null).substring(0, 200),
      errors,
    }, 'warn');
  }

  // Error logging with context
  logError(error: Error, context: LogContext = {}): void {
    logger.error('Application Error', {
      message: error.message,
      stack: error.stack,
      context,
      timestamp: new Date().toISOString(),
    });
  }

  logWarning(message: string, context: LogContext = {}): void {
    logger.warn('Warning', {
      message,
      context,
      timestamp: new Date().toISOString(),
    });
  }

  logInfo(message: string, context: LogContext = {}): void {
    logger.info('Info', {
      message,
      context,
      timestamp: new Date().toISOString(),
    });
  }

  // Lobby activity logging
  logLobbyActivity(activity: string, lobbyId: number, connectionId: string | null, details: LogContext = {}): void {
    logger.info('Lobby Activity', {
      activity,
      lobbyId,
      connectionId,
      details,
      timestamp: new Date().toISOString(),
    });
  }
}

export const loggingService = LoggingService.getInstance();
