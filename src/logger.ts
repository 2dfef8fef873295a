/**
 * Logger module - structured JSON logging, with optional file rotation
 */

import pino, { Logger, LoggerOptions } from 'pino';
import * as path from 'path';

export type { Logger } from 'pino';

const level = process.env.LOG_LEVEL || 'info';

function buildLogger(): Logger {
  const base: LoggerOptions = {
    name: 'image-updater',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const logDir = process.env.LOG_DIR;
  if (!logDir) {
    return pino({
      ...base,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
    });
  }

  // Console plus a rotated file; pino rejects custom level formatters with multiple targets
  return pino({
    ...base,
    transport: {
      targets: [
        { target: 'pino/file', level, options: { destination: 1 } },
        {
          target: 'pino-roll',
          level,
          options: {
            file: path.join(logDir, 'image-updater.log'),
            frequency: process.env.LOG_FREQUENCY || 'daily',
            size: process.env.LOG_MAX_SIZE || '100m',
            limit: { count: parseInt(process.env.LOG_MAX_FILES || '7', 10) },
            mkdir: true,
          },
        },
      ],
    },
  });
}

export const logger = buildLogger();

// Create child loggers for different modules
export const createLogger = (name: string): Logger => {
  return logger.child({ module: name });
};

export default logger;
