import pino, { type Logger, type DestinationStream } from 'pino';

const DEFAULT_LEVEL = 'warn';

export function createRootLogger(
  destination?: DestinationStream,
  level: string = process.env.LOG_LEVEL || DEFAULT_LEVEL,
): Logger {
  return pino(
    {
      level,
      base: { name: 'stubweave' },
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    destination ?? pino.destination(2),
  );
}

const logger = createRootLogger();

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export default logger;
