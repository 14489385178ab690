export interface TabLessonEntry {
  lessonId: string;
  seriesId: string;
  lessonTitle?: string;
  tabId: string;
  lastActive: number;
}

export interface UserTrackingRecord {
  userId: string;
  activeLessons: TabLessonEntry[];
  /** Copy of the focused entry in `activeLessons`, never a shared reference. */
  focused: TabLessonEntry | null;
  lastUpdated: number;
}

export interface EnterLessonInput {
  userId: string;
  lessonId: string;
  seriesId: string;
  tabId: string;
  lessonTitle?: string;
}

export interface TabRef {
  userId: string;
  tabId: string;
}

export interface FocusResult {
  userId: string;
  entry: TabLessonEntry;
  totalActiveTabs: number;
}

export type ExitResult =
  | { kind: 'nothing_to_clear'; userId: string }
  | { kind: 'all_cleared'; userId: string }
  | { kind: 'cleared'; userId: string; remaining: number; focused: TabLessonEntry };

export interface LessonContent {
  lesson_id: string;
  series_id: string;
  title: string;
  description?: string;
  video_url?: string;
  transcript?: string;
}

export interface CurrentView {
  userId: string;
  focused: TabLessonEntry;
  activeLessons: TabLessonEntry[];
  totalActiveTabs: number;
  lastUpdated: number;
  lessonDetails?: LessonContent;
}

export type CurrentResult = { present: false; userId: string } | ({ present: true } & CurrentView);

export interface TrackingMetrics {
  enterTotal: number;
  exitTotal: number;
  focusTotal: number;
  focusNotFoundTotal: number;
  storeErrorTotal: number;
  enrichmentMissTotal: number;
}
