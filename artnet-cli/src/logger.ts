/**
 * File logger for the console.
 *
 * ink owns the terminal while the console runs, so diagnostics are appended
 * to a log file instead. Until `initLogger` is called every call is a no-op.
 */

import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from 'artnet-shared';

let logFile: string | null = null;

export function initLogger(filePath: string): void {
  logFile = filePath;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  } catch {
    // Writes below fail quietly if the directory is unusable
  }
}

export function closeLogger(): void {
  logFile = null;
}

function write(line: string): void {
  if (!logFile) return;
  try {
    fs.appendFileSync(logFile, `${new Date().toISOString()} ${line}\n`);
  } catch {
    // Logging must never take the console down
  }
}

export function log(message: string): void {
  write(`[INFO] ${message}`);
}

export function logError(message: string, error?: unknown): void {
  write(error === undefined ? `[ERROR] ${message}` : `[ERROR] ${message}: ${errorMessage(error)}`);
}
