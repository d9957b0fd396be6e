// src/utils/logger.ts
import pino from 'pino';

const pretty = process.env.LOG_PRETTY !== 'false';

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  ...(pretty
    ? {
        transport: {
          target: 'pino-pretty', // readable console logs; set LOG_PRETTY=false for raw JSON
          options: {
            singleLine: true,
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
          },
        },
      }
    : {}),
});

export default logger;
