import winston from 'winston';
import fs from 'fs';
import path from 'path';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const logsDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
const logFilePath = process.env.LOG_FILE_PATH || path.join(logsDir, 'fix-order-entry.log');

// Rotate at 5MB, keep 5 files
const rotateOptions = {
  maxsize: 5242880,
  maxFiles: 5,
  tailable: true
};

const lineFormat = winston.format.printf(({ level, message, timestamp, stack }) => {
  return stack
    ? `${timestamp} [${level}]: ${message}\n${stack}`
    : `${timestamp} [${level}]: ${message}`;
});

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: isTest,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp(),
      lineFormat
    )
  })
];

if (!isTest) {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: logFilePath,
      ...rotateOptions
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      ...rotateOptions
    })
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    lineFormat
  ),
  transports
});

export default logger;
