import { Schema, type Connection, type Model } from 'mongoose';
import { createLogger } from '../logger.js';
import type { UserTrackingRecord } from '../types.js';
import type { TrackingStore } from './record-store.js';
import { parseStoredRecord, toStoredRecord, type StoredActiveLesson, type StoredTrackingRecord } from './record-schema.js';

const logger = createLogger('mongo-store');

export const TRACKING_COLLECTION = 'current_lesson_tracking';

const lessonFields = {
  lesson_id: { type: String, required: true },
  series_id: { type: String, required: true },
  lesson_title: { type: String },
  tab_id: { type: String, required: true }
};

const activeLessonSchema = new Schema<StoredActiveLesson<Date>>({ ...lessonFields, last_active: { type: Date, required: true } }, { _id: false });
const currentLessonSchema = new Schema<Omit<StoredActiveLesson<Date>, 'last_active'>>(lessonFields, { _id: false });

const trackingSchema = new Schema<StoredTrackingRecord<Date>>(
  {
    user_id: { type: String, required: true, unique: true },
    active_lessons: { type: [activeLessonSchema], default: [] },
    current_lesson: { type: currentLessonSchema, required: false },
    last_updated: { type: Date, required: true }
  },
  { collection: TRACKING_COLLECTION, versionKey: false, autoIndex: false }
);

export class MongoTrackingStore implements TrackingStore {
  private readonly model: Model<StoredTrackingRecord<Date>>;

  constructor(connection: Connection, private readonly maxTimeMs: number) {
    this.model = connection.model<StoredTrackingRecord<Date>>('CurrentLessonTracking', trackingSchema);
  }

  /** Creates the unique `user_id` index; a failure is logged, not fatal. */
  async ensureIndexes(): Promise<void> {
    try {
      await this.model.createIndexes();
      logger.info('tracking indexes ready');
    } catch (error) {
      logger.warn({ err: error }, 'failed to create tracking indexes');
    }
  }

  async load(userId: string): Promise<UserTrackingRecord | null> {
    const raw: unknown = await this.model.findOne({ user_id: userId }).maxTimeMS(this.maxTimeMs).lean().exec();
    return raw ? parseStoredRecord(raw) : null;
  }

  async save(record: UserTrackingRecord): Promise<void> {
    const doc = toStoredRecord(record, (ms) => new Date(ms));
    await this.model
      .replaceOne({ user_id: record.userId }, doc, { upsert: true })
      .maxTimeMS(this.maxTimeMs)
      .exec();
  }

  async remove(userId: string): Promise<boolean> {
    const result = await this.model.deleteOne({ user_id: userId }).maxTimeMS(this.maxTimeMs).exec();
    return result.deletedCount > 0;
  }
}
