import pino, { type Logger as PinoLogger } from 'pino';

const pretty = process.env.LOG_PRETTY === '1' || process.env.LOG_PRETTY === 'true';

export const logger = pino({
  name: 'repair-intake',
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  redact: {
    paths: ['smtp.password', 'asanaPat', 'secret'],
    censor: '[redacted]',
  },
  ...(pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
});

export type Logger = PinoLogger;
