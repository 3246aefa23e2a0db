import fs from 'node:fs/promises';
import path from 'node:path';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogRecord {
  ts: string;
  level: LogLevel;
  event: string;
  data?: unknown;
}

const RECENT_LIMIT = 500;

/**
 * Append-only NDJSON event log. Writes are serialized; a failed write is kept
 * and rethrown by the next `flush()` or `log()`.
 */
export class EventLogger {
  private pending: Promise<void> = Promise.resolve();
  private failure: unknown = null;
  private readonly recentRecords: LogRecord[] = [];

  /** A null path keeps records in memory only. */
  constructor(private readonly logFilePath: string | null) {}

  async init(): Promise<void> {
    if (!this.logFilePath) return;
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, data?: unknown): Promise<void> {
    this.enqueue(level, event, data);
    await this.flush();
  }

  enqueue(level: LogLevel, event: string, data?: unknown): void {
    const record: LogRecord = {
      ts: isoNow(),
      level,
      event,
      ...(data === undefined ? {} : { data }),
    };

    this.recentRecords.push(record);
    if (this.recentRecords.length > RECENT_LIMIT) {
      this.recentRecords.shift();
    }

    const filePath = this.logFilePath;
    if (!filePath) return;

    const line = `${JSON.stringify(record)}\n`;
    this.pending = this.pending
      .then(() => fs.appendFile(filePath, line))
      .catch((error: unknown) => {
        this.failure ??= error;
      });
  }

  recent(limit = 50): LogRecord[] {
    return this.recentRecords.slice(-limit);
  }

  async flush(): Promise<void> {
    await this.pending;
    if (this.failure !== null) {
      const failure = this.failure;
      this.failure = null;
      throw failure;
    }
  }
}
