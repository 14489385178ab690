import {
  ErrorCode,
  createError,
  createStoreError,
  createValidationError,
  failure,
  success,
  type Result
} from '../errors.js';
import type { LessonContentGateway } from '../enrichment/lesson-gateway.js';
import { createLogger } from '../logger.js';
import { Counters } from '../metrics/counters.js';
import type { TrackingStore } from '../persistence/record-store.js';
import type {
  CurrentResult,
  EnterLessonInput,
  ExitResult,
  FocusResult,
  LessonContent,
  TabLessonEntry,
  TabRef,
  UserTrackingRecord
} from '../types.js';
import { enterLesson, exitLesson, updateFocus, type StoreEffect } from './focus-machine.js';

const logger = createLogger('tracking-service');

export interface TrackingServiceDeps {
  store: TrackingStore;
  lessons: LessonContentGateway;
  counters: Counters;
  clock?: () => number;
}

function missingFields(fields: Record<string, string | undefined>): string[] {
  return Object.entries(fields)
    .filter(([, value]) => !value || value.trim().length === 0)
    .map(([name]) => name);
}

/**
 * Runs one focus-machine transition per call: at most one store read and one store
 * write. Failures come back as `Result` values; nothing thrown by the store escapes.
 */
export class TrackingService {
  private readonly store: TrackingStore;
  private readonly lessons: LessonContentGateway;
  private readonly counters: Counters;
  private readonly clock: () => number;

  constructor(deps: TrackingServiceDeps) {
    this.store = deps.store;
    this.lessons = deps.lessons;
    this.counters = deps.counters;
    this.clock = deps.clock ?? Date.now;
  }

  async enterLesson(input: EnterLessonInput): Promise<Result<FocusResult>> {
    const missing = missingFields({ user_id: input.userId, lesson_id: input.lessonId, series_id: input.seriesId, tab_id: input.tabId });
    if (missing.length > 0) return failure(createValidationError(missing));

    const loaded = await this.loadRecord(input.userId);
    if (!loaded.ok) return loaded;

    const { effect, outcome } = enterLesson(loaded.value, input, this.clock());
    const applied = await this.apply(input.userId, effect);
    if (!applied.ok) return applied;

    this.counters.enterTotal += 1;
    logger.info({ userId: input.userId, lessonId: input.lessonId, tabId: input.tabId, tabs: outcome.totalActiveTabs }, 'lesson entered');
    return success({ userId: input.userId, entry: outcome.entry, totalActiveTabs: outcome.totalActiveTabs });
  }

  async exitLesson(ref: TabRef): Promise<Result<ExitResult>> {
    const missing = missingFields({ user_id: ref.userId, tab_id: ref.tabId });
    if (missing.length > 0) return failure(createValidationError(missing));

    const loaded = await this.loadRecord(ref.userId);
    if (!loaded.ok) return loaded;

    const { effect, outcome } = exitLesson(loaded.value, ref.userId, ref.tabId, this.clock());
    const applied = await this.apply(ref.userId, effect);
    if (!applied.ok) return applied;

    this.counters.exitTotal += 1;
    logger.info({ userId: ref.userId, tabId: ref.tabId, outcome: outcome.kind }, 'lesson exited');
    return success(outcome);
  }

  async updateFocus(ref: TabRef): Promise<Result<FocusResult>> {
    const missing = missingFields({ user_id: ref.userId, tab_id: ref.tabId });
    if (missing.length > 0) return failure(createValidationError(missing));

    const loaded = await this.loadRecord(ref.userId);
    if (!loaded.ok) return loaded;

    const { effect, outcome } = updateFocus(loaded.value, ref.tabId, this.clock());
    if (outcome.kind === 'not_found') {
      this.counters.focusNotFoundTotal += 1;
      const message = outcome.reason === 'no_tracking_data'
        ? `no tracking data for user: ${ref.userId}`
        : `tab not found: ${ref.userId}/${ref.tabId}`;
      return failure(createError(ErrorCode.NOT_FOUND, { message, details: { reason: outcome.reason } }));
    }

    const applied = await this.apply(ref.userId, effect);
    if (!applied.ok) return applied;

    this.counters.focusTotal += 1;
    logger.debug({ userId: ref.userId, tabId: ref.tabId }, 'focus updated');
    return success({ userId: ref.userId, entry: outcome.entry, totalActiveTabs: outcome.totalActiveTabs });
  }

  /** Absent users are a normal result, not an error. Enrichment is best-effort. */
  async getCurrent(userId: string): Promise<Result<CurrentResult>> {
    const missing = missingFields({ user_id: userId });
    if (missing.length > 0) return failure(createValidationError(missing));

    const loaded = await this.loadRecord(userId);
    if (!loaded.ok) return loaded;

    const record = loaded.value;
    if (!record || !record.focused) return success({ present: false, userId });

    const lessonDetails = await this.enrich(userId, record.focused);
    return success({
      present: true,
      userId,
      focused: record.focused,
      activeLessons: record.activeLessons,
      totalActiveTabs: record.activeLessons.length,
      lastUpdated: record.lastUpdated,
      ...(lessonDetails ? { lessonDetails } : {})
    });
  }

  private async enrich(userId: string, focused: TabLessonEntry): Promise<LessonContent | null> {
    let details: LessonContent | null;
    try {
      details = await this.lessons.fetchLessonDetails(focused.seriesId, focused.lessonId);
    } catch (error) {
      this.counters.enrichmentMissTotal += 1;
      logger.warn({ err: error, userId, lessonId: focused.lessonId, code: ErrorCode.ENRICHMENT_UNAVAILABLE }, 'lesson details lookup failed');
      return null;
    }
    if (!details) {
      this.counters.enrichmentMissTotal += 1;
      logger.debug({ userId, lessonId: focused.lessonId, seriesId: focused.seriesId }, 'no lesson details found');
    }
    return details;
  }

  private async loadRecord(userId: string): Promise<Result<UserTrackingRecord | null>> {
    try {
      return success(await this.store.load(userId));
    } catch (error) {
      return this.storeFailure('load tracking data', userId, error);
    }
  }

  private async apply(userId: string, effect: StoreEffect): Promise<Result<void>> {
    try {
      if (effect.type === 'save') await this.store.save(effect.record);
      else if (effect.type === 'delete') await this.store.remove(userId);
      return success(undefined);
    } catch (error) {
      return this.storeFailure(effect.type === 'delete' ? 'delete tracking data' : 'save tracking data', userId, error);
    }
  }

  private storeFailure<T>(operation: string, userId: string, error: unknown): Result<T> {
    this.counters.storeErrorTotal += 1;
    logger.error({ err: error, userId, operation }, 'tracking store failure');
    return failure(createStoreError(operation, error));
  }
}
