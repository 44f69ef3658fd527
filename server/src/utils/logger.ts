import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const transport =
  isProduction || isTest
    ? undefined
    : pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
        },
      });

export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
    redact: ['req.headers.authorization', 'req.headers.cookie', 'database.password'],
  },
  transport
);

export type Logger = typeof logger;
