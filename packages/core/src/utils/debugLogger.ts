/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/* eslint-disable no-console */
import * as fs from 'node:fs';
import * as util from 'node:util';

export interface DebugLoggerOptions {
  /** File that receives every message, one timestamped line each. */
  logFile?: string;
  /** Whether messages are also written to the console. Defaults to true. */
  mirrorToConsole?: boolean;
}

/**
 * A small logger for developer-facing debug messages. Hosts hand one to the
 * engine through the composer options.
 */
export class DebugLogger {
  private readonly logStream: fs.WriteStream | undefined;
  private readonly mirrorToConsole: boolean;

  constructor(options: DebugLoggerOptions = {}) {
    this.mirrorToConsole = options.mirrorToConsole ?? true;
    this.logStream = options.logFile
      ? fs.createWriteStream(options.logFile, { flags: 'a' })
      : undefined;
    this.logStream?.on('error', (err) => {
      console.error('Error writing to debug log stream:', err);
    });
  }

  private writeToFile(level: string, args: unknown[]) {
    if (this.logStream) {
      const message = util.format(...args);
      const timestamp = new Date().toISOString();
      const logEntry = `[${timestamp}] [${level}] ${message}\n`;
      this.logStream.write(logEntry);
    }
  }

  log(...args: unknown[]): void {
    this.writeToFile('LOG', args);
    if (this.mirrorToConsole) console.log(...args);
  }

  warn(...args: unknown[]): void {
    this.writeToFile('WARN', args);
    if (this.mirrorToConsole) console.warn(...args);
  }

  error(...args: unknown[]): void {
    this.writeToFile('ERROR', args);
    if (this.mirrorToConsole) console.error(...args);
  }

  debug(...args: unknown[]): void {
    this.writeToFile('DEBUG', args);
    if (this.mirrorToConsole) console.debug(...args);
  }

  /** Flushes and closes the log file, if any. */
  close(): Promise<void> {
    const stream = this.logStream;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise((resolve) => stream.end(resolve));
  }
}

/** Logger that writes nowhere; the engine default when a host passes none. */
export const quietLogger = new DebugLogger({ mirrorToConsole: false });
