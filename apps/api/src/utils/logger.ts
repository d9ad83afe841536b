import { pino } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const level = process.env.LOG_LEVEL ?? (nodeEnv === 'development' ? 'debug' : 'info');

export const logger = pino({
  level,
  transport: nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,reqId,res,responseTime',
      messageFormat: '{msg}',
      translateTime: 'HH:MM:ss UTC',
    },
  } : undefined,
});
