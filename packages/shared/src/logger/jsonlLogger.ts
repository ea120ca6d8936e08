import * as fs from 'fs/promises';
import * as path from 'path';
import type { EvalEvent } from '../types/events';
import { redact } from '../redaction';
import type { Logger } from './types';

/**
 * Appends events to a JSONL file, one redacted event per line.
 * Level messages go to the console.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private dirReady: Promise<void> | undefined;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async log(event: EvalEvent): Promise<void> {
    const line = JSON.stringify(redact(event)) + '\n';
    try {
      this.dirReady ??= fs.mkdir(path.dirname(this.filePath), { recursive: true }).then(() => {});
      await this.dirReady;
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging must not fail an evaluation.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  debug(message: string): void {
    console.debug(message);
  }

  info(message: string): void {
    console.info(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }
}
