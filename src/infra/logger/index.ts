/**
 * Logger factory using Pino
 * Logs go to stderr so report output on stdout stays clean
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const STDERR_FD = 2;

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'inmate-records',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (finalConfig.pretty === true && finalConfig.level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: STDERR_FD,
      },
    };
    return pinoLib(options);
  }

  return pinoLib(options, pinoLib.destination(STDERR_FD));
};

/**
 * Child logger bound to one pipeline stage
 */
export const createStageLogger = (parent: Logger, stage: string): Logger => {
  return parent.child({ stage });
};

export { type Logger } from 'pino';
