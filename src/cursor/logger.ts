import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type LogContext = Record<string, unknown>;
export type Logger = winston.Logger;

const mainLogger = winston.createLogger({
  level: 'warn',
  defaultMeta: { module: 'long-cursor' },
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: [new winston.transports.Console()],
});

export const getLogger = (context?: LogContext): Logger => {
  return mainLogger.child(context || {});
};

export default mainLogger;

export function setLogLevel(level: LogLevel) {
  mainLogger.level = level;
}
