/**
 * Logger module - structured JSON logging to stderr
 */

import pino from 'pino';

const level = process.env.NODE_ENV === 'test'
  ? 'silent'
  : process.env.LOG_LEVEL || 'info';

export const logger = pino(
  {
    name: 'dockerd-pull',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  },
  pino.destination({ dest: 2, sync: true })
);

// Create child loggers for different modules
export const createLogger = (name: string) => {
  return logger.child({ module: name });
};

export default logger;
