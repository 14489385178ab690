import { describe, expect, it } from 'vitest';
import { parseEnterLessonBody, parseTabRefBody } from '../../src/server/api/schemas.js';

describe('request schemas', () => {
  it('trims identifiers and drops blank titles', () => {
    const parsed = parseEnterLessonBody({ user_id: ' u1 ', lesson_id: 'l1', series_id: 's1', tab_id: 't1', lesson_title: '  ' });
    expect(parsed).toEqual({ ok: true, value: { userId: 'u1', lessonId: 'l1', seriesId: 's1', tabId: 't1' } });
  });

  it('accepts the legacy serie_id field', () => {
    const parsed = parseEnterLessonBody({ user_id: 'u1', lesson_id: 'l1', serie_id: 's-legacy', tab_id: 't1' });
    expect(parsed.ok && parsed.value.seriesId).toBe('s-legacy');

    const both = parseEnterLessonBody({ user_id: 'u1', lesson_id: 'l1', series_id: 's-new', serie_id: 's-old', tab_id: 't1' });
    expect(both.ok && both.value.seriesId).toBe('s-new');
  });

  it('lists every missing field', () => {
    const parsed = parseEnterLessonBody({ user_id: 'u1', tab_id: '' });
    expect(parsed.ok ? null : parsed.error.message).toBe('lesson_id/series_id/tab_id are required');
  });

  it('treats a non-object body as missing everything', () => {
    const parsed = parseTabRefBody(undefined);
    expect(parsed.ok ? null : parsed.error.message).toBe('user_id/tab_id are required');
  });

  it('rejects non-string identifiers', () => {
    const parsed = parseTabRefBody({ user_id: 'u1', tab_id: 42 });
    expect(parsed.ok ? null : parsed.error.message).toBe('tab_id is required');
  });

  it('reports a mistyped title as a type error', () => {
    const parsed = parseEnterLessonBody({ user_id: 'u1', lesson_id: 'l1', series_id: 's1', tab_id: 't1', lesson_title: 42 });
    expect(parsed.ok ? null : parsed.error.message).toBe('lesson_title must be a string');
    expect(parsed.ok ? null : parsed.error.details).toEqual({ fields: ['lesson_title'] });
  });
});
