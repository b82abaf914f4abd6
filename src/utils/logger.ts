import winston from 'winston';
import path from 'path';
import fs from 'fs';

const logLevel = process.env.LOG_LEVEL || 'info';
const logsDir = process.env.LOG_DIR;

// Regular expressions for PII detection. Sender addresses are the main
// payload of this tool, so they never reach the log files in clear text.
const PII_PATTERNS = [
  // Email addresses
  { pattern: /([a-zA-Z0-9_\-.+]+)@([a-zA-Z0-9_\-.]+)\.([a-zA-Z]{2,})/g, replacement: '[REDACTED_EMAIL]' },
  // IP Addresses
  { pattern: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, replacement: '[REDACTED_IP]' }
];

export function redactString(value: string): string {
  return PII_PATTERNS.reduce(
    (result, { pattern, replacement }) => result.replace(pattern, replacement),
    value
  );
}

function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactString(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Error)) {
    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      redacted[key] = redactValue(entry);
    }
    return redacted;
  }
  return value;
}

/**
 * Format function to redact PII data from logs.
 * Only string-keyed fields are rewritten; winston's symbol keys stay intact.
 */
const redactPII = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = redactValue(info[key]);
  }
  return info;
});

const transports: winston.transport[] = [
  new winston.transports.Console({
    // stdout is left to the CLI summary
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  })
];

if (logsDir) {
  try {
    fs.mkdirSync(logsDir, { recursive: true });
    transports.push(
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error'
      }),
      new winston.transports.File({
        filename: path.join(logsDir, 'combined.log')
      })
    );
  } catch (error) {
    // Fall back to the console transport only
    console.error('Failed to create logs directory:', error);
  }
}

export const logger = winston.createLogger({
  level: logLevel,
  silent: process.env.NODE_ENV === 'test' && !process.env.SHOW_LOGS,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    redactPII(),
    winston.format.json()
  ),
  defaultMeta: { service: 'sender-topology' },
  transports,
  exitOnError: false
});

/**
 * Creates a child logger tagged with the pipeline stage it belongs to
 * @param stage Stage name, e.g. 'extraction'
 */
export function getStageLogger(stage: string): winston.Logger {
  return logger.child({ stage });
}
