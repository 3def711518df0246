/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/* eslint-disable no-console */
import * as fs from 'node:fs';
import * as util from 'node:util';

export const DEBUG_LOG_FILE_ENV = 'LINED_DEBUG_LOG_FILE';

/**
 * Developer-facing diagnostics. Everything written here is also appended to
 * the file named by `LINED_DEBUG_LOG_FILE` when that variable is set.
 *
 * `debug()` only reaches the console once debug mode is switched on, so the
 * REPL transcript stays clean for ordinary sessions.
 */
class DebugLogger {
  private logStream: fs.WriteStream | undefined;
  private debugMode = false;

  constructor() {
    const logFile = process.env[DEBUG_LOG_FILE_ENV];
    this.logStream = logFile
      ? fs.createWriteStream(logFile, {
          flags: 'a',
        })
      : undefined;
    this.logStream?.on('error', (err) => {
      console.error('Error writing to debug log stream:', err);
    });
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  private writeToFile(level: string, args: unknown[]) {
    if (this.logStream) {
      const message = util.format(...args);
      const timestamp = new Date().toISOString();
      this.logStream.write(`[${timestamp}] [${level}] ${message}\n`);
    }
  }

  log(...args: unknown[]): void {
    this.writeToFile('LOG', args);
    console.log(...args);
  }

  warn(...args: unknown[]): void {
    this.writeToFile('WARN', args);
    console.warn(...args);
  }

  error(...args: unknown[]): void {
    this.writeToFile('ERROR', args);
    console.error(...args);
  }

  debug(...args: unknown[]): void {
    this.writeToFile('DEBUG', args);
    if (this.debugMode) {
      console.debug(...args);
    }
  }
}

export const debugLogger = new DebugLogger();
