import winston from 'winston';
import path from 'path';
import fs from 'fs';

const LOG_FOLDER = process.env.LOG_FOLDER;

// Sensitive data patterns to filter
const SENSITIVE_PATTERNS = [
  /password[=:]\s*["']?[^"'\s]+["']?/gi,
  /pass[=:]\s*["']?[^"'\s]+["']?/gi,
  /token[=:]\s*["']?[\w-]+["']?/gi,
  /authorization[=:]\s*(?:basic\s+)?["']?[\w+/=-]+["']?/gi,
];

/**
 * Replace credential values in a log message
 */
export function redact(message: string): string {
  let filtered = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    filtered = filtered.replace(pattern, (match) => {
      const [key] = match.split(/[=:]/);
      return `${key}=***REDACTED***`;
    });
  }
  return filtered;
}

const filterSensitiveData = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redact(info.message);
  }
  return info;
});

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.printf(({ timestamp, level, message, module }) => {
    const modulePrefix = module ? `[${module}]` : '';
    return `${timestamp} ${level} ${modulePrefix} ${message}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.json()
);

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  // File output only when the embedding process asks for it
  if (LOG_FOLDER) {
    if (!fs.existsSync(LOG_FOLDER)) {
      fs.mkdirSync(LOG_FOLDER, { recursive: true });
    }
    transports.push(
      new winston.transports.File({
        filename: path.join(LOG_FOLDER, 'tsdb-client-error.log'),
        level: 'error',
        format: fileFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(LOG_FOLDER, 'tsdb-client.log'),
        format: fileFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return transports;
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports: buildTransports(),
});

// Create a child logger with module context
export function createLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

export default logger;
