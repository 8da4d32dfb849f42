import winston from 'winston';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel | undefined;
  logFile?: string | undefined;
}

const format = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, message, name, ...meta }) => {
    const nameTag = name ? ` [${String(name)}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level.toUpperCase()}${nameTag} ${String(message)}${metaStr}`;
  })
);

// Diagnostics go to stderr; stdout is reserved for result lines
const rootLogger = winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? 'warn',
  format,
  transports: [
    new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] }),
  ],
});

export function createLogger(name: string): winston.Logger {
  return rootLogger.child({ name });
}

export function configureLogging(options: LoggerOptions): void {
  if (options.level) {
    rootLogger.level = options.level;
  }

  if (options.logFile) {
    rootLogger.add(
      new winston.transports.File({
        filename: options.logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }
}
