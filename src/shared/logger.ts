import pino, { type Logger, type DestinationStream } from 'pino';

export type { Logger };

export function createRootLogger(destination?: DestinationStream): Logger {
  const options = {
    name: 'doctags',
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

/** CLI runs keep stdout for command output; logs go to stderr. */
export function createCliLogger(): Logger {
  return createRootLogger(pino.destination(2));
}

const logger = createRootLogger();

export function createLogger(context: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(context);
}

export default logger;
