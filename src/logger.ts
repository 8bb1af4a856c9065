import {inspect} from 'util';
import {SPLAT} from 'triple-beam';
import * as winston from 'winston';

export const logLevels: Array<string> = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

const isPrimitive = (value: unknown): boolean => {
  return value === null || (typeof value !== 'object' && typeof value !== 'function');
};

const formatWithInspect = (value: unknown): string => {
  const prefix: string = isPrimitive(value) ? '' : '\n';
  if (typeof value === 'string') {
    return prefix + value;
  }

  return prefix + inspect(value, {depth: null, colors: true});
};

export const logger: winston.Logger = winston.createLogger({
  level: 'info',
  transports: [
    new winston.transports.Console({
      stderrLevels: ['warn', 'error'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf((info: winston.Logform.TransformableInfo) => {
          const msg: string = formatWithInspect(info.message);
          const splat: unknown = info[SPLAT];
          const splatArgs: Array<unknown> = Array.isArray(splat) ? splat : [];
          const rest: string = splatArgs.map((data: unknown) => { return formatWithInspect(data); })
            .join(' ');

          return `${String(info.timestamp)} - ${info.level}: ${msg} ${rest}`.trimEnd();
        }),
      ),
    }),
  ],
});

export function setLogLevel(level: string): void {
  if (logLevels.indexOf(level) < 0) {
    throw new Error(`unknown loglevel '${level}'. Use one of ${logLevels.join(', ')}`);
  }

  logger.level = level;
}

export function logVerbose(): boolean {
  return ['verbose', 'debug', 'silly'].indexOf(logger.level) >= 0;
}
