import type { CurrentResult, ExitResult, FocusResult, TabLessonEntry } from '../types.js';

export interface SerializedEntry {
  lesson_id: string;
  series_id: string;
  lesson_title: string | null;
  tab_id: string;
  last_active: string;
}

const iso = (ms: number): string => new Date(ms).toISOString();

export function serializeEntry(entry: TabLessonEntry): SerializedEntry {
  return {
    lesson_id: entry.lessonId,
    series_id: entry.seriesId,
    lesson_title: entry.lessonTitle ?? null,
    tab_id: entry.tabId,
    last_active: iso(entry.lastActive)
  };
}

export function serializeFocus(result: FocusResult) {
  return { user_id: result.userId, ...serializeEntry(result.entry), total_active_tabs: result.totalActiveTabs };
}

export function describeExit(result: ExitResult): string {
  switch (result.kind) {
    case 'nothing_to_clear':
      return 'No current lesson was set';
    case 'all_cleared':
      return 'All lessons cleared';
    case 'cleared':
      return `Lesson cleared, ${result.remaining} ${result.remaining === 1 ? 'tab remains' : 'tabs remain'}`;
    default: {
      const exhaustiveCheck: never = result;
      return exhaustiveCheck;
    }
  }
}

export function serializeExit(result: ExitResult) {
  if (result.kind === 'cleared') {
    return { user_id: result.userId, remaining_tabs: result.remaining, current_lesson: serializeEntry(result.focused) };
  }
  return { user_id: result.userId, remaining_tabs: 0, current_lesson: null };
}

/** Shape read by the chatbot; absent users get the same keys with empty values. */
export function serializeCurrent(result: CurrentResult) {
  if (!result.present) {
    return {
      user_id: result.userId,
      is_in_lesson: false,
      lesson_id: null,
      series_id: null,
      lesson_title: null,
      tab_id: null,
      last_updated: null,
      active_lessons: [],
      total_active_tabs: 0
    };
  }
  return {
    user_id: result.userId,
    is_in_lesson: true,
    lesson_id: result.focused.lessonId,
    series_id: result.focused.seriesId,
    lesson_title: result.focused.lessonTitle ?? null,
    tab_id: result.focused.tabId,
    last_updated: iso(result.lastUpdated),
    active_lessons: result.activeLessons.map(serializeEntry),
    total_active_tabs: result.totalActiveTabs,
    ...(result.lessonDetails ? { lesson_details: result.lessonDetails } : {})
  };
}
