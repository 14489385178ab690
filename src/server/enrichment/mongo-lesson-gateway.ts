import { Schema, type Connection, type Model } from 'mongoose';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import type { LessonContent } from '../types.js';
import type { LessonContentGateway } from './lesson-gateway.js';

const logger = createLogger('lesson-gateway');

const lessonContentSchema = z.object({
  lesson_id: z.string().min(1),
  series_id: z.string().min(1),
  title: z.string(),
  description: z.string().nullish(),
  video_url: z.string().nullish(),
  transcript: z.string().nullish()
});

/** Validates a raw lesson document and drops empty optional fields. */
export function toLessonContent(raw: unknown): LessonContent | null {
  const parsed = lessonContentSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { description, video_url, transcript, ...identity } = parsed.data;
  return {
    ...identity,
    ...(description ? { description } : {}),
    ...(video_url ? { video_url } : {}),
    ...(transcript ? { transcript } : {})
  };
}

const lessonSchema = new Schema<LessonContent>(
  {
    lesson_id: { type: String, required: true },
    series_id: { type: String, required: true },
    title: { type: String, required: true },
    description: String,
    video_url: String,
    transcript: String
  },
  { versionKey: false, autoIndex: false }
);

export class MongoLessonGateway implements LessonContentGateway {
  private readonly model: Model<LessonContent>;

  constructor(connection: Connection, collection: string, private readonly maxTimeMs: number) {
    this.model = connection.model<LessonContent>('Lesson', lessonSchema, collection);
  }

  async fetchLessonDetails(seriesId: string, lessonId: string): Promise<LessonContent | null> {
    const raw: unknown = await this.model
      .findOne({ lesson_id: lessonId, series_id: seriesId })
      .maxTimeMS(this.maxTimeMs)
      .lean()
      .exec();
    if (!raw) return null;

    const content = toLessonContent(raw);
    if (!content) logger.warn({ seriesId, lessonId }, 'malformed lesson document');
    return content;
  }
}
