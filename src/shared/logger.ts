import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

let root: winston.Logger | null = null;

function createRootLogger(): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (process.env.LOG_TO_FILE !== 'false') {
    transports.push(
      new winston.transports.File({ filename: 'error.log', level: 'error' }),
      new DailyRotateFile({
        filename: 'combined-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '10m',
        maxFiles: '7d',
        zippedArchive: false,
      }),
    );
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.LOG_SILENT === 'true',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    transports,
  });
}

export class Logger {
  private logger: winston.Logger;

  constructor(private context: string) {
    if (!root) root = createRootLogger();
    this.logger = root.child({ context });
  }

  info(message: string, meta?: unknown): void {
    this.logger.info(message, toMeta(meta));
  }

  error(message: string, meta?: unknown): void {
    this.logger.error(message, toMeta(meta));
  }

  warn(message: string, meta?: unknown): void {
    this.logger.warn(message, toMeta(meta));
  }

  debug(message: string, meta?: unknown): void {
    this.logger.debug(message, toMeta(meta));
  }
}

// winston merges object meta into the log record; errors and primitives go under a key
function toMeta(meta: unknown): object | undefined {
  if (meta === undefined) return undefined;
  if (meta instanceof Error) return { error: meta.message, stack: meta.stack };
  if (typeof meta === 'object' && meta !== null) return meta;
  return { detail: meta };
}
