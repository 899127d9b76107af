import { pino } from 'pino';

import { env } from '../config/index.js';

const transport = env.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname,app,env',
        singleLine: true
      }
    }
  : undefined;

export const logger = pino({
  level: env.LOG_LEVEL,
  base: {
    app: 'photo-tools',
    env: env.NODE_ENV
  },
  transport
});
