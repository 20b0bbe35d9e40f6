import winston from 'winston';

import type { Config } from '../config/args';

// syslog-like ordering, `notice` sits between warn and info
export const customLevels = {
  levels: { error: 0, warn: 1, notice: 2, info: 3, debug: 4 },
};

declare module 'winston' {
  interface Logger {
    notice: winston.LeveledLogMethod;
  }
}

const lineFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(
    ({ timestamp, level, message }) =>
      `${String(timestamp)} [${level}]: ${String(message)}`
  )
);

type LoggerConfig = Pick<Config, 'log_level' | 'logger' | 'log_file'>;

const transportFor = (config: LoggerConfig) =>
  config.logger === 'file'
    ? new winston.transports.File({ filename: config.log_file })
    : // errors and warnings go to stderr
      new winston.transports.Console({ stderrLevels: ['error', 'warn'] });

export const buildLogger = (config: LoggerConfig): winston.Logger =>
  winston.createLogger({
    levels: customLevels.levels,
    level: config.log_level,
    format: lineFormat,
    transports: [transportFor(config)],
  });
