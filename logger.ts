import winston from 'winston';

// Winston logger setup (module scope)
export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        return `${timestamp} [${level.toUpperCase()}] ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
      }),
    ),
    transports: [new winston.transports.Console()],
  });
}

export const logger = createLogger();
