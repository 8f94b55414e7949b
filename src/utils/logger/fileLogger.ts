import fs from 'fs';
import path from 'path';
import schedule from 'node-schedule';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { rotateFile, RotateFileOptions } from '../rotateFile.js';

export interface FileLogWriter {
  write(line: string): void;
  close(): void;
}

/**
 * Append-only log file that is rotated once a day at midnight.
 * Rotated copies older than `retentionDays` are removed on each rotation.
 */
export function createRotatingFileWriter(
  logFile: string,
  retentionDays: number,
): FileLogWriter {
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

  return {
    write(line: string) {
      logStream.write(line);
    },
    close() {
      job?.cancel();
      logStream.end();
    },
  };
}
