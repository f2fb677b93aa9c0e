import pino from 'pino';

const level = process.env.WEBPILOT_LOG_LEVEL ?? 'info';
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  level,
  ...(pretty && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    },
  }),
});

export type Logger = typeof logger;
