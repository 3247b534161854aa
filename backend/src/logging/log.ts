/**
 * Simple Logger
 *
 * Service-scoped console logger with an optional JSON-lines file sink
 */

import fs from 'fs';
import path from 'path';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  timestamp: number;
  data?: unknown;
}

const MAX_RETAINED_ENTRIES = 1000;

export class Log {
  private static instances = new Map<string, Log>();
  private static logFilePath: string | null = process.env.LOG_FILE_PATH || null;
  private static fileReady = false;
  private static silent = false;

  private service: string;
  private entries: LogEntry[] = [];

  private constructor(service: string) {
    this.service = service;
  }

  static create(config: { service: string }): Log {
    const { service } = config;
    let instance = Log.instances.get(service);
    if (!instance) {
      instance = new Log(service);
      Log.instances.set(service, instance);
    }
    return instance;
  }

  /**
   * Redirect the file sink (null disables it) and toggle console output.
   */
  static configure(options: { filePath?: string | null; silent?: boolean }): void {
    if (options.filePath !== undefined) {
      Log.logFilePath = options.filePath;
      Log.fileReady = false;
    }
    if (options.silent !== undefined) {
      Log.silent = options.silent;
    }
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogEntry['level'], message: string, data?: unknown) {
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      data,
    };
    this.entries.push(entry);
    if (this.entries.length > MAX_RETAINED_ENTRIES) {
      this.entries.splice(0, this.entries.length - MAX_RETAINED_ENTRIES);
    }

    if (!Log.silent) {
      const prefix = `[${new Date(entry.timestamp).toISOString()}] [${this.service}] [${level.toUpperCase()}]`;
      const output = `${prefix} ${message}`;

      if (level === 'error') {
        console.error(output, data ?? '');
      } else if (level === 'warn') {
        console.warn(output, data ?? '');
      } else {
        console.log(output, data ?? '');
      }
    }

    this.writeToFile(entry);
  }

  private writeToFile(entry: LogEntry): void {
    const filePath = Log.logFilePath;
    if (!filePath) {
      return;
    }
    try {
      if (!Log.fileReady) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        Log.fileReady = true;
      }
      const payload = JSON.stringify({
        ...entry,
        service: this.service,
      });
      fs.appendFileSync(filePath, `${payload}\n`, { encoding: 'utf8' });
    } catch (error) {
      // Keep logger non-fatal.
      console.warn('[Log] Failed to persist log entry:', error);
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear() {
    this.entries = [];
  }
}

export function createLogger(service: string): Log {
  return Log.create({ service });
}
