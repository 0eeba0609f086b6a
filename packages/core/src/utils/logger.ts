import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

export const logger = pino({
  level,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
});

/**
 * Local sink used when log records are written before initialize().
 * Writes to standard error so the records never mix with program output.
 */
export function createFallbackLogger(): pino.Logger {
  return pino(
    {
      level: 'trace',
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    pino.destination(2),
  );
}

/** Standard output logger used for console echo of spans and log records. */
export function createEchoLogger(): pino.Logger {
  return pino(
    {
      level: 'trace',
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    pino.destination(1),
  );
}
