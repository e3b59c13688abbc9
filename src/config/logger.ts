import winston from 'winston';

const { combine, timestamp, errors, splat, json, colorize, printf } = winston.format;

const environment = process.env.NODE_ENV || 'development';

const devFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${ts} ${level}: ${stack || message}${extra}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (environment === 'production' ? 'info' : 'debug'),
  format: combine(errors({ stack: true }), timestamp(), splat(), json()),
  defaultMeta: { service: 'campus-registry-api' },
  transports: [
    new winston.transports.Console({
      format:
        environment === 'production'
          ? combine(errors({ stack: true }), timestamp(), json())
          : combine(colorize(), timestamp({ format: 'HH:mm:ss' }), devFormat),
    }),
  ],
  silent: environment === 'test',
});

/** Flattens an unknown thrown value into loggable metadata. */
export const errorMeta = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    return { error: error.message, name: error.name, stack: error.stack };
  }
  return { error: String(error) };
};

export default logger;
