/**
 * Holdgate Logger
 * Production-grade logging with Winston
 */

import winston from 'winston';
import path from 'path';
import { existsSync, mkdirSync } from 'fs';
import os from 'os';

// Determine Holdgate home directory
const HOLDGATE_HOME = process.env.HOLDGATE_HOME || path.join(os.homedir(), '.holdgate');

// Ensure the holdgate directory exists
if (!existsSync(HOLDGATE_HOME)) {
  mkdirSync(HOLDGATE_HOME, { recursive: true });
}

const LOG_FILE = path.join(HOLDGATE_HOME, 'holdgate.log');

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.HOLDGATE_SILENT === '1',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'holdgate' },
  transports: [
    // Console transport (colorized for development)
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
          return `[${timestamp}] ${level}: ${message} ${metaStr}`;
        })
      ),
    }),

    // File transport (structured JSON logs)
    new winston.transports.File({
      filename: LOG_FILE,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      format: winston.format.json(),
    }),
  ],
});

export const LOG_PATH = LOG_FILE;
export const HOLDGATE_DATA_DIR = HOLDGATE_HOME;
