import pino from 'pino';
import pretty from 'pino-pretty';

export type Logger = pino.Logger;

let rootLogger: Logger | null = null;

const createRootLogger = (): Logger => {
  const environment = process.env.NODE_ENV ?? 'development';
  const isProduction = environment === 'production';

  const loggerConfig: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL ?? 'info',
    base: {
      service: 'dir-tree-finder',
      environment,
    },
  };

  if (isProduction) {
    return pino(loggerConfig);
  }

  // stdout carries the listing, so pretty output goes to stderr
  return pino(
    loggerConfig,
    pretty({
      colorize: true,
      singleLine: true,
      translateTime: 'yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,hostname',
      destination: process.stderr,
    }),
  );
};

/**
 * Shared logger. The pretty stream attaches to stderr, so it is built once per
 * process; callers get a child tagged with their component.
 */
export const getLogger = (component?: string): Logger => {
  rootLogger ??= createRootLogger();
  return component ? rootLogger.child({ component }) : rootLogger;
};
