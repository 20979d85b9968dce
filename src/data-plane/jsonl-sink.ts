/**
 * Append-only JSONL event log: one JSON object per line.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { isJsonValue, isRecord } from '../domain/artifact';
import { KernelEvent, isKernelEventType } from '../domain/events';
import { EventSink } from './publisher';

export class JsonlFileSink implements EventSink {
  private chain: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(readonly filePath: string) {}

  /** Writes are applied in call order. */
  write(event: KernelEvent): Promise<void> {
    const line = `${JSON.stringify(event)}\n`;
    const next = this.chain.then(async () => {
      if (!this.dirReady) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      await fs.appendFile(this.filePath, line, 'utf8');
    });
    this.chain = next.catch(() => undefined);
    return next;
  }

  async close(): Promise<void> {
    await this.chain;
  }
}

/** Parse a JSONL event log. Blank lines are skipped; malformed lines throw. */
export async function readJsonlEvents(filePath: string): Promise<KernelEvent[]> {
  const text = await fs.readFile(filePath, 'utf8');
  const events: KernelEvent[] = [];
  text.split('\n').forEach((line, index) => {
    if (line.trim() === '') return;
    const parsed: unknown = JSON.parse(line);
    if (
      !isRecord(parsed) ||
      typeof parsed.event_type !== 'string' ||
      !isKernelEventType(parsed.event_type) ||
      typeof parsed.timestamp !== 'string' ||
      typeof parsed.event_number !== 'number'
    ) {
      throw new Error(`Line ${index + 1} of ${filePath} is not a kernel event`);
    }
    const event: KernelEvent = {
      event_number: parsed.event_number,
      event_type: parsed.event_type,
      timestamp: parsed.timestamp,
    };
    for (const [key, value] of Object.entries(parsed)) {
      if (!(key in event) && isJsonValue(value)) event[key] = value;
    }
    events.push(event);
  });
  return events;
}
