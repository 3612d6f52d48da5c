/**
 * JSONL Log Sink - one JSON object per line
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ConsoleLogEntry, ConsoleLogLevel, ConsoleLogSubscriber } from './console-logger';

const LEVEL_ORDER: Record<ConsoleLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface JsonlLogSinkOptions {
  /** Output file path */
  filePath: string;
  /** Lowest level written (default: 'info') */
  minLevel?: ConsoleLogLevel;
}

/**
 * Appends console log entries to a JSONL file
 */
export class JsonlLogSink implements ConsoleLogSubscriber {
  private readonly filePath: string;
  private readonly minLevel: ConsoleLogLevel;
  private initialized = false;

  constructor(options: JsonlLogSinkOptions) {
    this.filePath = options.filePath;
    this.minLevel = options.minLevel ?? 'info';
  }

  onLog(entry: ConsoleLogEntry): void {
    if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    if (!this.initialized) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.initialized = true;
    }
    fs.appendFileSync(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  getFilePath(): string {
    return this.filePath;
  }
}

/**
 * Echoes entries to stderr (enabled with --verbose)
 */
export class StderrLogSink implements ConsoleLogSubscriber {
  onLog(entry: ConsoleLogEntry): void {
    process.stderr.write(`[${entry.level}] ${entry.category}: ${entry.message}\n`);
  }
}
