import pino, { type Logger } from 'pino';
import { isProduction, type AppConfig } from './config.js';

export function createLogger(config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>): Logger {
  const isProd = isProduction(config);

  return pino({
    level: config.logLevel,
    transport: isProd
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            singleLine: true,
          },
        },
  });
}
