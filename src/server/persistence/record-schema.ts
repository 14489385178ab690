import { z } from 'zod';
import { restoreFocus } from '../tracking/focus-machine.js';
import type { TabLessonEntry, UserTrackingRecord } from '../types.js';

// MongoDB hands back BSON dates, the snapshot file epoch milliseconds.
const timestampSchema = z
  .union([z.date(), z.number().int().nonnegative()])
  .transform((v) => (typeof v === 'number' ? v : v.getTime()));

const currentLessonSchema = z.object({
  lesson_id: z.string().min(1),
  series_id: z.string().min(1),
  lesson_title: z.string().nullish(),
  tab_id: z.string().min(1)
});

const activeLessonSchema = currentLessonSchema.extend({
  last_active: timestampSchema
});

export const storedRecordSchema = z.object({
  user_id: z.string().min(1),
  active_lessons: z.array(activeLessonSchema),
  current_lesson: currentLessonSchema.nullish(),
  last_updated: timestampSchema
});

// Records are validated one by one through parseStoredRecord.
export const snapshotEnvelopeSchema = z.object({
  version: z.literal(1),
  savedAt: z.number(),
  records: z.array(z.unknown())
});

export interface StoredActiveLesson<T> {
  lesson_id: string;
  series_id: string;
  lesson_title?: string;
  tab_id: string;
  last_active: T;
}

export interface StoredTrackingRecord<T> {
  user_id: string;
  active_lessons: StoredActiveLesson<T>[];
  current_lesson?: Omit<StoredActiveLesson<T>, 'last_active'>;
  last_updated: T;
}

export interface TrackingSnapshot {
  version: 1;
  savedAt: number;
  records: StoredTrackingRecord<number>[];
}

function toStoredEntry<T>(entry: TabLessonEntry, encode: (ms: number) => T): StoredActiveLesson<T> {
  return {
    lesson_id: entry.lessonId,
    series_id: entry.seriesId,
    ...(entry.lessonTitle !== undefined ? { lesson_title: entry.lessonTitle } : {}),
    tab_id: entry.tabId,
    last_active: encode(entry.lastActive)
  };
}

export function toStoredRecord<T>(record: UserTrackingRecord, encode: (ms: number) => T): StoredTrackingRecord<T> {
  const stored: StoredTrackingRecord<T> = {
    user_id: record.userId,
    active_lessons: record.activeLessons.map((e) => toStoredEntry(e, encode)),
    last_updated: encode(record.lastUpdated)
  };
  if (record.focused) {
    const { last_active: _lastActive, ...current } = toStoredEntry(record.focused, encode);
    stored.current_lesson = current;
  }
  return stored;
}

/** Validates a raw stored document and rebuilds the typed record. */
export function parseStoredRecord(raw: unknown): UserTrackingRecord {
  const doc = storedRecordSchema.parse(raw);
  const record: UserTrackingRecord = {
    userId: doc.user_id,
    activeLessons: doc.active_lessons.map((e) => ({
      lessonId: e.lesson_id,
      seriesId: e.series_id,
      ...(e.lesson_title ? { lessonTitle: e.lesson_title } : {}),
      tabId: e.tab_id,
      lastActive: e.last_active
    })),
    focused: null,
    lastUpdated: doc.last_updated
  };
  return restoreFocus(record, doc.current_lesson?.tab_id);
}
