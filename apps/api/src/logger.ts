import { pino, type Logger, type LoggerOptions } from 'pino';
import { getEnv, type Env } from './env.js';

export function loggerOptions(env: Pick<Env, 'LOG_LEVEL' | 'LOG_PRETTY'>): LoggerOptions {
  return {
    level: env.LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() })
    },
    ...(env.LOG_PRETTY === 'true'
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'yyyy-mm-dd HH:MM:ss.l',
              ignore: 'pid,hostname',
              singleLine: true
            }
          }
        }
      : {})
  };
}

const baseLogger = pino(loggerOptions(getEnv()));

export function createLogger(module: string): Logger {
  return baseLogger.child({ module });
}
