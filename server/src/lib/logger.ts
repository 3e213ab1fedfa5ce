import pino from 'pino';
import './env.js';

export const logger = pino({
  name: 'chamber-proxy',
  level: process.env.LOG_LEVEL || 'info',
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});
