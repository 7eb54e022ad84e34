import pino, { LoggerOptions } from 'pino';
import { recordError } from './metrics';

// Configure Pino logger
const createLogger = () => {
  const baseConfig: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    hooks: {
      logMethod(inputArgs, method, level) {
        // Level 50 is ERROR, 60 is FATAL
        if (level >= 50) {
          recordError('application');
        }
        return method.apply(this, inputArgs);
      }
    }
  };

  // Structured JSON in 'production', 'staging' and 'test' so Loki can index it.
  const environment = process.env.ENVIRONMENT?.toLowerCase() || 'production';
  const forceJson = process.env.LOG_FORMAT?.toLowerCase() === 'json';
  const useStructuredLogging = forceJson || ['production', 'staging', 'test'].includes(environment);

  if (!useStructuredLogging) {
    return pino({
      ...baseConfig,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname'
        }
      }
    });
  }

  return pino({
    ...baseConfig,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => {
        return { level: label };
      },
    },
  });
};

export const logger = createLogger();

export const trackEvent = (name: string, properties?: Record<string, string | number | boolean>) => {
  logger.trace({ event: name, properties }, `Custom event: ${name}`);
};

export const trackMetric = (name: string, value: number, properties?: Record<string, string | number | boolean>) => {
  logger.trace({ metric: name, value, properties }, `Custom metric: ${name} = ${value}`);
};

/** Last four characters of a sender id, for log lines. */
export const maskSender = (senderId: string): string => senderId.slice(-4);
