import winston from 'winston';
import { loggingConfig, type LoggedService } from '@core/config/logging';

/**
 * Minimal logging surface used across the value layer and the translator.
 */
export interface ILogger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface ILoggerFactory {
  createServiceLogger(serviceName: LoggedService): winston.Logger;
}

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${timestamp} [${level}]${service ? ` [${service}]` : ''} ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ' ' + JSON.stringify(metadata);
    }
    return msg;
  })
);

/**
 * Resolve the level for a service. LOG_LEVEL always wins; under test the
 * level drops to TEST_LOG_LEVEL or error.
 */
function resolveLevel(serviceName: LoggedService): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.REDCAP_LOGIC_DEBUG === 'true') {
    return 'debug';
  }

  return loggingConfig.services[serviceName].level;
}

/**
 * Factory for winston service loggers
 */
export class LoggerFactory implements ILoggerFactory {
  private readonly loggers = new Map<LoggedService, winston.Logger>();

  createServiceLogger(serviceName: LoggedService): winston.Logger {
    const existing = this.loggers.get(serviceName);
    if (existing) {
      return existing;
    }

    const level = resolveLevel(serviceName);
    const quiet = process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL;

    const logger = winston.createLogger({
      level,
      levels: loggingConfig.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      defaultMeta: { service: serviceName },
      // A logger without transports complains on every write, so tests get a
      // silent console instead of none.
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          level,
          silent: quiet,
          stderrLevels: ['error', 'warn']
        })
      ]
    });

    if (process.env.REDCAP_LOGIC_LOG_FILE) {
      logger.add(new winston.transports.File({
        filename: process.env.REDCAP_LOGIC_LOG_FILE,
        format: winston.format.json()
      }));
    }

    this.loggers.set(serviceName, logger);
    return logger;
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggedService): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const valuesLogger = createServiceLogger('values');
export const grammarLogger = createServiceLogger('grammar');
export const translatorLogger = createServiceLogger('translator');
export const configLogger = createServiceLogger('config');
export const branchingLogger = createServiceLogger('branching');

export default translatorLogger;
