import winston from 'winston';
import type TransportStream from 'winston-transport';
import { mkdirSync } from 'fs';
import { join } from 'path';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';
const LOG_FILE_MAX_BYTES = 1024 * 1024;
const LOG_FILE_ROTATIONS = 3;

const lineFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  const head = `${timestamp} [${level}]: ${message}`;
  if (stack) {
    return `${head}\n${stack}`;
  }
  return Object.keys(metadata).length > 0 ? `${head} ${JSON.stringify(metadata)}` : head;
});

// stdout carries report JSON, so every level goes to stderr
const consoleTransport = new winston.transports.Console({
  format: combine(colorize(), timestamp({ format: TIMESTAMP_FORMAT }), lineFormat),
  stderrLevels: Object.keys(winston.config.npm.levels),
});

function rotatingFile(dir: string, name: string, level?: string): TransportStream {
  return new winston.transports.File({
    filename: join(dir, name),
    level,
    maxsize: LOG_FILE_MAX_BYTES,
    maxFiles: LOG_FILE_ROTATIONS,
  });
}

let logDirectory: string | null = null;
let fileTransports: TransportStream[] = [];

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: combine(errors({ stack: true }), timestamp({ format: TIMESTAMP_FORMAT }), lineFormat),
  transports: [consoleTransport],
});

function detachFiles(): void {
  for (const transport of fileTransports) {
    logger.remove(transport);
    transport.close?.();
  }
  fileTransports = [];
  logDirectory = null;
}

/**
 * Write `error.log` and `combined.log` under `dir` in addition to the
 * console. Calling again with another directory moves file logging there.
 */
export function configureLogDirectory(dir: string): void {
  if (!dir || dir === logDirectory) {
    return;
  }

  mkdirSync(dir, { recursive: true });
  const next = [rotatingFile(dir, 'error.log', 'error'), rotatingFile(dir, 'combined.log')];

  detachFiles();
  for (const transport of next) {
    logger.add(transport);
  }
  fileTransports = next;
  logDirectory = dir;
}

/** Stop file logging; the console transport stays. */
export function closeLogFiles(): void {
  detachFiles();
}

export function currentLogDirectory(): string | null {
  return logDirectory;
}
