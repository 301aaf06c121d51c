import winston from 'winston';

const VERBOSITY_LEVELS = ['warn', 'info', 'debug'] as const;

const logFormat = winston.format.combine(
  winston.format.errors({ stack: true }),
  winston.format.printf((info) => {
    const scope = typeof info.module === 'string' ? ` ${info.module}:` : '';
    const stack = typeof info.stack === 'string' && info.showStack === true ? `\n${info.stack}` : '';
    return `[${info.level}]${scope} ${String(info.message)}${stack}`;
  }),
);

const logger = winston.createLogger({
  level: process.env.LINKPLAY_LOG_LEVEL || 'warn',
  format: logFormat,
  transports: [new winston.transports.Console()],
});

/**
 * Maps a repeated `-v` count to a log level: 0 warn, 1 info, 2 or more debug.
 */
export function setVerbosity(verbosity: number): string {
  const index = Math.max(0, Math.min(VERBOSITY_LEVELS.length - 1, verbosity));
  const level = VERBOSITY_LEVELS[index];
  logger.level = level;
  return level;
}

export type Logger = winston.Logger;

export default logger;
