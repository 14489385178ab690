import type { LessonContent } from '../types.js';

/** Read-only lookup of full lesson content; `null` when the lesson is unknown. */
export interface LessonContentGateway {
  fetchLessonDetails(seriesId: string, lessonId: string): Promise<LessonContent | null>;
}

export class DisabledLessonGateway implements LessonContentGateway {
  async fetchLessonDetails(): Promise<LessonContent | null> {
    return null;
  }
}
