import fs from 'fs';
import path from 'path';
import schedule from 'node-schedule';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { rotateFile, type RotateFileOptions } from '../rotateFile.js';

export interface ConsoleTeeOptions {
  /** Application log file; defaults to data/app.log under the working directory */
  logFile?: string;
  /** Days rotated files are kept */
  retentionDays?: number;
}

type ConsoleMethod = 'log' | 'info' | 'warn' | 'error';

/**
 * Copies console output into a log file that is rotated every midnight.
 * Returns a function that restores the console, stops rotation and
 * resolves once the file is flushed.
 */
export function installConsoleTee(options: ConsoleTeeOptions = {}): () => Promise<void> {
  const orig = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  const logFile =
    options.logFile || path.resolve(process.cwd(), 'data/app.log');
  ensureDirExistence(logFile);

  const rotateFileOptions: RotateFileOptions = {
    dir: path.dirname(logFile),
    filename: path.basename(logFile),
    retentionDays: options.retentionDays ?? 7,
  };

  rotateFile(rotateFileOptions);
  let logStream = fs.createWriteStream(logFile, { flags: 'a' });

  const job = schedule.scheduleJob('0 0 * * *', () => {
    logStream.end();
    rotateFile(rotateFileOptions);
    logStream = fs.createWriteStream(logFile, { flags: 'a' });
  });

  const write = (type: ConsoleMethod, args: unknown[]) => {
    const now = new Date().toISOString();
    const message = `[${now}] [${type.toUpperCase()}] ${args.map(String).join(' ')}\n`;
    logStream.write(message);
  };

  const tee = (type: ConsoleMethod) => (...args: unknown[]) => {
    write(type, args);
    orig[type](...args);
  };

  console.log = tee('log');
  console.info = tee('info');
  console.warn = tee('warn');
  console.error = tee('error');

  return () => {
    job.cancel();
    console.log = orig.log;
    console.info = orig.info;
    console.warn = orig.warn;
    console.error = orig.error;
    return new Promise(resolve => {
      logStream.end(() => resolve());
    });
  };
}
