import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

/**
 * Human-readable format for development
 */
const devFormat = combine(
  colorize(),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  printf(({ level, message, timestamp, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
  })
);

/**
 * JSON format for production log aggregation
 */
const prodFormat = combine(timestamp(), json());

/**
 * Determine log level from environment
 */
function getLogLevel(): string {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && ['debug', 'info', 'warn', 'error'].includes(level)) {
    return level;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Main application logger
 */
export const logger = winston.createLogger({
  level: getLogLevel(),
  format: process.env.NODE_ENV === 'production' ? prodFormat : devFormat,
  transports: [new winston.transports.Console()],
  defaultMeta: { service: 'wechat-bot-plugins' },
});

const auditFiles = new Set<string>();

/**
 * Also write info-level entries, audit entries included, to a file.
 * Adding the same path twice is a no-op.
 */
export function enableAuditLog(filename: string): void {
  if (auditFiles.has(filename)) {
    return;
  }
  auditFiles.add(filename);
  logger.add(new winston.transports.File({ filename, level: 'info' }));
}

/**
 * Audit entry for an executed plugin command.
 * Always logged at 'info' so it reaches the audit file transport.
 */
export function auditLog(entry: {
  plugin: string;
  route: string;
  chatId: string;
  senderId: string;
  trigger: string;
  query: string;
}): void {
  logger.info('Command executed', {
    type: 'audit',
    ...entry,
  });
}
