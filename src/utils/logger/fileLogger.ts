import fs from 'fs';
import path from 'path';
import schedule from 'node-schedule';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { rotateFile, type RotateFileOptions } from '../rotateFile.js';
import { isTest } from '../isTest.js';

type ConsoleMethod = 'log' | 'info' | 'warn' | 'error';

const METHODS: ConsoleMethod[] = ['log', 'info', 'warn', 'error'];

export interface ConsoleCaptureOptions {
  logFile: string;
  retentionDays?: number;
}

/**
 * Mirror console output into a log file rotated daily at midnight.
 * Returns a function restoring the original console.
 */
export function captureConsole({ logFile, retentionDays = 7 }: ConsoleCaptureOptions): () => void {
  ensureDirExistence(logFile);

  const rotateFileOptions: RotateFileOptions = {
    dir: path.dirname(logFile),
    filename: path.basename(logFile),
    retentionDays,
  };

  rotateFile(rotateFileOptions);
  let logStream = fs.createWriteStream(logFile, { flags: 'a' });

  const job = schedule.scheduleJob('0 0 * * *', () => {
    logStream.end();
    rotateFile(rotateFileOptions);
    logStream = fs.createWriteStream(logFile, { flags: 'a' });
  });

  const orig: Record<ConsoleMethod, (...args: unknown[]) => void> = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  for (const method of METHODS) {
    console[method] = (...args: unknown[]) => {
      const now = new Date().toISOString();
      logStream.write(`[${now}] [${method.toUpperCase()}] ${args.map(String).join(' ')}\n`);
      orig[method](...args);
    };
  }

  return () => {
    job.cancel();
    for (const method of METHODS) {
      console[method] = orig[method];
    }
    logStream.end();
  };
}

if (!isTest) {
  captureConsole({
    logFile: process.env.LOG_FILE_PATH || path.resolve(process.cwd(), 'data/app.log'),
    retentionDays: parseInt(process.env.LOG_RETENTION_DAYS || '7', 10),
  });
}
