import winston from 'winston';
import { LOG_LEVELS, loadConfig } from './config.js';

const config = loadConfig();
const quietTests = (process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST)) && !config.logLevelExplicit;

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${timestamp} [${level}]${service ? ` [${service}]` : ''} ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ' ' + JSON.stringify(metadata);
    }
    return msg;
  }),
);

/**
 * Root logger. Everything goes to stderr so that stdout stays free for the
 * output of `print` steps.
 */
export const rootLogger = winston.createLogger({
  level: config.logLevel,
  levels: winston.config.npm.levels,
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: [...LOG_LEVELS],
      silent: quietTests,
    }),
  ],
});

const serviceLoggers = new Map<string, winston.Logger>();

/** Child logger tagged with the component that's logging. */
export function getLogger(service: string): winston.Logger {
  let logger = serviceLoggers.get(service);
  if (!logger) {
    logger = rootLogger.child({ service });
    serviceLoggers.set(service, logger);
  }
  return logger;
}

/** Change the level of every logger at runtime. */
export function setLogLevel(level: string): void {
  rootLogger.level = level;
}
