import fs from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from '../logger.js';
import type { UserTrackingRecord } from '../types.js';
import { parseStoredRecord, snapshotEnvelopeSchema, type TrackingSnapshot } from './record-schema.js';

const logger = createLogger('snapshot-store');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class SnapshotStore {
  private timer?: NodeJS.Timeout;
  private inflight?: Promise<void>;
  constructor(private readonly filePath: string, private readonly flushMs: number) {}

  async loadSnapshot(): Promise<UserTrackingRecord[] | null> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) logger.warn({ err: error, path: this.filePath }, 'snapshot unreadable, starting empty');
      return null;
    }
    try {
      const envelope = snapshotEnvelopeSchema.parse(JSON.parse(data));
      return envelope.records.map(parseStoredRecord);
    } catch (error) {
      logger.warn({ err: error, path: this.filePath }, 'snapshot invalid, starting empty');
      return null;
    }
  }

  async saveSnapshot(state: TrackingSnapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(state, null, 2));
  }

  scheduleDebouncedSave(getter: () => TrackingSnapshot): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = undefined;
      const save = this.saveSnapshot(getter())
        .catch((error: unknown) => {
          logger.error({ err: error, path: this.filePath }, 'snapshot save failed');
        })
        .finally(() => {
          if (this.inflight === save) this.inflight = undefined;
        });
      this.inflight = save;
    }, this.flushMs);
  }

  /** Cancels any pending debounced save, waits for one already running, then writes `state`. */
  async flush(state: TrackingSnapshot): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.inflight) await this.inflight;
    await this.saveSnapshot(state);
  }
}
