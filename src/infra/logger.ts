import fs from 'node:fs/promises';
import path from 'node:path';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Append-only NDJSON event log. One line per call: { ts, level, event, ...data }.
 */
export class EventLogger {
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, data: Record<string, unknown> = {}): Promise<void> {
    const line = `${JSON.stringify({ ts: isoNow(), level, event, ...data })}\n`;

    // Lines keep call order. A failed append rejects this call only.
    const write = this.writes.then(() => fs.appendFile(this.logFilePath, line, 'utf-8'));
    this.writes = write.then(
      () => undefined,
      () => undefined,
    );
    await write;
  }

  async flush(): Promise<void> {
    await this.writes;
  }
}
