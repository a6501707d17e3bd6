import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  name: string;
  logFile?: string | undefined;
  silent?: boolean;
}

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export function createLogger(options: LoggerOptions): winston.Logger {
  const { level = 'info', name, logFile, silent = false } = options;

  // Diagnostics go to stderr so result rows on stdout stay clean
  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
  ];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level,
    silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} ${level.toUpperCase()} [${name}] ${message}${metaStr}`;
      })
    ),
    transports,
  });
}

export function createTargetLogger(parent: winston.Logger, target: string): winston.Logger {
  return parent.child({ target });
}

export function createSilentLogger(name = 'test'): winston.Logger {
  return createLogger({ name, silent: true });
}
