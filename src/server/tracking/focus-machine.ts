import type { EnterLessonInput, ExitResult, TabLessonEntry, UserTrackingRecord } from '../types.js';

export type StoreEffect = { type: 'save'; record: UserTrackingRecord } | { type: 'delete' } | { type: 'none' };

export interface Transition<T> {
  effect: StoreEffect;
  outcome: T;
}

export type FocusOutcome = { kind: 'focused'; entry: TabLessonEntry; totalActiveTabs: number };
export type FocusMissReason = 'no_tracking_data' | 'tab_not_found';
export type UpdateFocusOutcome = FocusOutcome | { kind: 'not_found'; reason: FocusMissReason };

export function emptyRecord(userId: string, now: number): UserTrackingRecord {
  return { userId, activeLessons: [], focused: null, lastUpdated: now };
}

function copyEntry(entry: TabLessonEntry): TabLessonEntry {
  return { ...entry };
}

// A tab's lastActive never moves backwards, even if the wall clock does.
function touch(previous: number | undefined, now: number): number {
  return previous === undefined ? now : Math.max(previous, now);
}

/** Most recently active entry; ties go to the earliest in insertion order. */
export function electFocus(entries: readonly TabLessonEntry[]): TabLessonEntry | null {
  let best: TabLessonEntry | null = null;
  for (const entry of entries) {
    if (!best || entry.lastActive > best.lastActive) best = entry;
  }
  return best ? copyEntry(best) : null;
}

export function findTab(record: UserTrackingRecord, tabId: string): TabLessonEntry | undefined {
  return record.activeLessons.find((e) => e.tabId === tabId);
}

export function enterLesson(current: UserTrackingRecord | null, input: EnterLessonInput, now: number): Transition<FocusOutcome> {
  const base = current ?? emptyRecord(input.userId, now);
  const previous = findTab(base, input.tabId);
  const entry: TabLessonEntry = {
    lessonId: input.lessonId,
    seriesId: input.seriesId,
    ...(input.lessonTitle !== undefined ? { lessonTitle: input.lessonTitle } : {}),
    tabId: input.tabId,
    lastActive: touch(previous?.lastActive, now)
  };
  const activeLessons = [...base.activeLessons.filter((e) => e.tabId !== input.tabId).map(copyEntry), entry];
  const record: UserTrackingRecord = { userId: base.userId, activeLessons, focused: copyEntry(entry), lastUpdated: now };
  return { effect: { type: 'save', record }, outcome: { kind: 'focused', entry: copyEntry(entry), totalActiveTabs: activeLessons.length } };
}

export function exitLesson(current: UserTrackingRecord | null, userId: string, tabId: string, now: number): Transition<ExitResult> {
  if (!current) return { effect: { type: 'none' }, outcome: { kind: 'nothing_to_clear', userId } };

  const activeLessons = current.activeLessons.filter((e) => e.tabId !== tabId).map(copyEntry);
  const focused = electFocus(activeLessons);
  if (!focused) return { effect: { type: 'delete' }, outcome: { kind: 'all_cleared', userId } };

  // Re-election runs on every exit, including exits of a tab that did not hold focus.
  const record: UserTrackingRecord = { userId: current.userId, activeLessons, focused, lastUpdated: now };
  return { effect: { type: 'save', record }, outcome: { kind: 'cleared', userId, remaining: activeLessons.length, focused: copyEntry(focused) } };
}

export function updateFocus(current: UserTrackingRecord | null, tabId: string, now: number): Transition<UpdateFocusOutcome> {
  if (!current) return { effect: { type: 'none' }, outcome: { kind: 'not_found', reason: 'no_tracking_data' } };
  const target = findTab(current, tabId);
  if (!target) return { effect: { type: 'none' }, outcome: { kind: 'not_found', reason: 'tab_not_found' } };

  const entry: TabLessonEntry = { ...target, lastActive: touch(target.lastActive, now) };
  const activeLessons = current.activeLessons.map((e) => (e.tabId === tabId ? entry : copyEntry(e)));
  const record: UserTrackingRecord = { userId: current.userId, activeLessons, focused: copyEntry(entry), lastUpdated: now };
  return { effect: { type: 'save', record }, outcome: { kind: 'focused', entry: copyEntry(entry), totalActiveTabs: activeLessons.length } };
}

/**
 * Rebuilds `focused` from the active entry with the same tab. A focus that points at a
 * tab no longer in `activeLessons` is replaced by re-election.
 */
export function restoreFocus(record: UserTrackingRecord, focusedTabId: string | undefined): UserTrackingRecord {
  const match = focusedTabId === undefined ? undefined : findTab(record, focusedTabId);
  const focused = match ? copyEntry(match) : electFocus(record.activeLessons);
  return { ...record, focused };
}
