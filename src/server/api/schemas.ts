import { z } from 'zod';
import { createTypeError, createValidationError, type TrackingError } from '../errors.js';
import type { EnterLessonInput, TabRef } from '../types.js';

const requiredId = z
  .string({ required_error: 'required', invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'required');

const optionalTitle = z
  .string()
  .trim()
  .nullish()
  .transform((v) => (v ? v : undefined));

// Older clients send the series under `serie_id`.
function withSeriesAlias(raw: unknown): unknown {
  if (raw && typeof raw === 'object' && !('series_id' in raw) && 'serie_id' in raw) {
    return { ...raw, series_id: raw.serie_id };
  }
  return raw;
}

export const enterLessonBodySchema = z.preprocess(
  withSeriesAlias,
  z
    .object({
      user_id: requiredId,
      lesson_id: requiredId,
      series_id: requiredId,
      tab_id: requiredId,
      lesson_title: optionalTitle
    })
    .transform((body): EnterLessonInput => ({
      userId: body.user_id,
      lessonId: body.lesson_id,
      seriesId: body.series_id,
      tabId: body.tab_id,
      ...(body.lesson_title !== undefined ? { lessonTitle: body.lesson_title } : {})
    }))
);

export const tabRefBodySchema = z
  .object({
    user_id: requiredId,
    tab_id: requiredId
  })
  .transform((body): TabRef => ({ userId: body.user_id, tabId: body.tab_id }));

const ENTER_FIELDS = ['user_id', 'lesson_id', 'series_id', 'tab_id'];
const TAB_REF_FIELDS = ['user_id', 'tab_id'];

function toValidationError(error: z.ZodError, requiredFields: string[]): TrackingError {
  const named = new Set<string>();
  for (const issue of error.issues) {
    const head = issue.path[0];
    if (typeof head === 'string') named.add(head);
  }
  // A non-object body fails at the root; every field is then missing.
  if (named.size === 0) return createValidationError(requiredFields);

  const missing = requiredFields.filter((f) => named.has(f));
  if (missing.length > 0) return createValidationError(missing);
  return createTypeError([...named]);
}

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: TrackingError };

export function parseEnterLessonBody(body: unknown): Parsed<EnterLessonInput> {
  const parsed = enterLessonBodySchema.safeParse(body);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false, error: toValidationError(parsed.error, ENTER_FIELDS) };
}

export function parseTabRefBody(body: unknown): Parsed<TabRef> {
  const parsed = tabRefBodySchema.safeParse(body);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false, error: toValidationError(parsed.error, TAB_REF_FIELDS) };
}
