import type { UserTrackingRecord } from '../types.js';
import type { TrackingStore } from './record-store.js';
import { toStoredRecord, type TrackingSnapshot } from './record-schema.js';
import type { SnapshotStore } from './snapshot-store.js';

function cloneRecord(record: UserTrackingRecord): UserTrackingRecord {
  return {
    ...record,
    activeLessons: record.activeLessons.map((e) => ({ ...e })),
    focused: record.focused ? { ...record.focused } : null
  };
}

/**
 * Process-local store. Records are copied on the way in and out so callers never hold
 * a reference into stored state. With a SnapshotStore attached, every mutation
 * schedules a debounced write of the whole map.
 */
export class MemoryTrackingStore implements TrackingStore {
  private readonly records = new Map<string, UserTrackingRecord>();

  constructor(private readonly snapshots?: SnapshotStore) {}

  async restore(): Promise<number> {
    const loaded = this.snapshots ? await this.snapshots.loadSnapshot() : null;
    if (!loaded) return 0;
    for (const record of loaded) {
      if (record.activeLessons.length > 0) this.records.set(record.userId, record);
    }
    return this.records.size;
  }

  async load(userId: string): Promise<UserTrackingRecord | null> {
    const record = this.records.get(userId);
    return record ? cloneRecord(record) : null;
  }

  async save(record: UserTrackingRecord): Promise<void> {
    this.records.set(record.userId, cloneRecord(record));
    this.scheduleSnapshot();
  }

  async remove(userId: string): Promise<boolean> {
    const deleted = this.records.delete(userId);
    if (deleted) this.scheduleSnapshot();
    return deleted;
  }

  size(): number { return this.records.size; }

  exportSnapshot(now: number = Date.now()): TrackingSnapshot {
    return { version: 1, savedAt: now, records: [...this.records.values()].map((r) => toStoredRecord(r, (ms) => ms)) };
  }

  async flush(): Promise<void> {
    if (this.snapshots) await this.snapshots.flush(this.exportSnapshot());
  }

  private scheduleSnapshot(): void {
    this.snapshots?.scheduleDebouncedSave(() => this.exportSnapshot());
  }
}
