import winston from 'winston';

export interface LoggerOptions {
  level?: string | undefined;
  name: string;
  logFile?: string | undefined;
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const { level = process.env['LOG_LEVEL'] ?? 'info', name, logFile } = options;

  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: ['error', 'warn'] }),
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

export function createScannerLogger(protocol: 'tcp' | 'udp', level?: string): winston.Logger {
  return winston.createLogger({
    level: level ?? process.env['LOG_LEVEL'] ?? 'info',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, target, port, error }) => {
        const targetTag = target ? ` [${target}${port !== undefined ? `:${port}` : ''}]` : '';
        const errorTag = error ? ` ERROR: ${error}` : '';
        return `${timestamp} ${level.toUpperCase()} [${protocol}-scanner]${targetTag} ${message}${errorTag}`;
      })
    ),
    defaultMeta: { protocol },
    transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
  });
}
