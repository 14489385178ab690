import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryTrackingStore } from '../../src/server/persistence/memory-store.js';
import type { TrackingSnapshot } from '../../src/server/persistence/record-schema.js';
import { SnapshotStore } from '../../src/server/persistence/snapshot-store.js';
import type { UserTrackingRecord } from '../../src/server/types.js';

const record: UserTrackingRecord = {
  userId: 'u1',
  activeLessons: [{ lessonId: 'l1', seriesId: 's1', lessonTitle: 'Intro', tabId: 'T1', lastActive: 1000 }],
  focused: { lessonId: 'l1', seriesId: 's1', lessonTitle: 'Intro', tabId: 'T1', lastActive: 1000 },
  lastUpdated: 1000
};

const emptySnapshot: TrackingSnapshot = { version: 1, savedAt: 0, records: [] };

// Holds the first write open until release() so a flush can overlap it.
class GatedSnapshotStore extends SnapshotStore {
  readonly events: string[] = [];
  private writes = 0;
  private open: () => void = () => {};
  private readonly gate = new Promise<void>((resolve) => {
    this.open = resolve;
  });

  release(): void {
    this.open();
  }

  override async saveSnapshot(): Promise<void> {
    this.writes += 1;
    const n = this.writes;
    this.events.push(`start:${n}`);
    if (n === 1) await this.gate;
    this.events.push(`end:${n}`);
  }
}

describe('memory-store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tracking-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('hands out copies of stored records', async () => {
    const store = new MemoryTrackingStore();
    await store.save(record);
    const loaded = await store.load('u1');
    loaded?.activeLessons.push({ lessonId: 'x', seriesId: 'x', tabId: 'X', lastActive: 1 });
    expect(await store.load('u1')).toEqual(record);
  });

  it('removes records and reports whether one existed', async () => {
    const store = new MemoryTrackingStore();
    await store.save(record);
    expect(await store.remove('u1')).toBe(true);
    expect(await store.remove('u1')).toBe(false);
    expect(await store.load('u1')).toBeNull();
  });

  it('restores records from a flushed snapshot', async () => {
    const file = path.join(dir, 'snapshot.json');
    const first = new MemoryTrackingStore(new SnapshotStore(file, 60_000));
    await first.save(record);
    await first.flush();

    const second = new MemoryTrackingStore(new SnapshotStore(file, 60_000));
    expect(await second.restore()).toBe(1);
    expect(await second.load('u1')).toEqual(record);
  });

  it('starts empty when the snapshot is missing or invalid', async () => {
    const missing = new MemoryTrackingStore(new SnapshotStore(path.join(dir, 'none.json'), 60_000));
    expect(await missing.restore()).toBe(0);

    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, 'not json');
    const broken = new MemoryTrackingStore(new SnapshotStore(file, 60_000));
    expect(await broken.restore()).toBe(0);
  });

  it('waits for a running debounced save before flushing', async () => {
    vi.useFakeTimers();
    try {
      const snapshots = new GatedSnapshotStore(path.join(dir, 'gated.json'), 100);
      snapshots.scheduleDebouncedSave(() => emptySnapshot);
      vi.advanceTimersByTime(100);
      expect(snapshots.events).toEqual(['start:1']);

      const flushing = snapshots.flush(emptySnapshot);
      expect(snapshots.events).toEqual(['start:1']);
      snapshots.release();
      await flushing;
      expect(snapshots.events).toEqual(['start:1', 'end:1', 'start:2', 'end:2']);
    } finally {
      vi.useRealTimers();
    }
  });
});
