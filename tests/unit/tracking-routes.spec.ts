import request from 'supertest';
import { describe, expect, it } from 'vitest';
import type { TrackingStore } from '../../src/server/persistence/record-store.js';
import type { UserTrackingRecord } from '../../src/server/types.js';
import { createTestApp } from '../helpers.js';

const brokenStore: TrackingStore = {
  async load(): Promise<UserTrackingRecord | null> { throw new Error('connection refused'); },
  async save(): Promise<void> { throw new Error('connection refused'); },
  async remove(): Promise<boolean> { throw new Error('connection refused'); }
};

describe('tracking routes', () => {
  it('returns validation_error for missing identifiers', async () => {
    const { app } = createTestApp();
    const res = await request(app)
      .post('/api/tracking/lesson/enter')
      .send({ user_id: 'u1', lesson_id: 'l1', series_id: 's1' })
      .expect(400);

    expect(res.body).toEqual({ ok: false, error: { code: 'validation_error', message: 'tab_id is required' } });
  });

  it('returns not_found when focusing a tab the user never opened', async () => {
    const { app } = createTestApp();
    const res = await request(app)
      .post('/api/tracking/lesson/focus')
      .send({ user_id: 'u1', tab_id: 'tabX' })
      .expect(404);

    expect(res.body.error).toEqual({ code: 'not_found', message: 'no tracking data for user: u1' });
  });

  it('maps store failures to 500 with the reason', async () => {
    const { app } = createTestApp({ store: brokenStore });
    const res = await request(app).get('/api/tracking/user/u1/current').expect(500);
    expect(res.body.error).toEqual({ code: 'store_error', message: 'failed to load tracking data: connection refused' });
  });

  it('rejects malformed JSON bodies', async () => {
    const { app } = createTestApp();
    const res = await request(app)
      .post('/api/tracking/lesson/exit')
      .set('Content-Type', 'application/json')
      .send('{"user_id":')
      .expect(400);

    expect(res.body).toEqual({ ok: false, error: { code: 'validation_error', message: 'malformed JSON body' } });
  });

  it('rejects oversized bodies with their own status', async () => {
    const { app } = createTestApp();
    const res = await request(app)
      .post('/api/tracking/lesson/enter')
      .send({ user_id: 'u1', lesson_id: 'l1', series_id: 's1', tab_id: 'tabX', lesson_title: 'x'.repeat(200_000) })
      .expect(413);

    expect(res.body).toEqual({
      ok: false,
      error: { code: 'validation_error', message: 'request body rejected: entity.too.large' }
    });
  });

  it('answers health checks at the root and under the prefix', async () => {
    const { app } = createTestApp();
    const expected = { status: 'healthy', service: 'tracking-service', version: '1.0.0' };
    expect((await request(app).get('/health').expect(200)).body).toEqual(expected);
    expect((await request(app).get('/api/tracking/health').expect(200)).body).toEqual(expected);
  });

  it('reports counters on the status route', async () => {
    const { app, advance } = createTestApp();
    await request(app).post('/api/tracking/lesson/enter').send({ user_id: 'u1', lesson_id: 'l1', series_id: 's1', tab_id: 't1' }).expect(200);
    advance(5_000);

    const res = await request(app).get('/api/tracking/status').expect(200);
    expect(res.body.store).toBe('memory');
    expect(res.body.uptimeMs).toBe(5_000);
    expect(res.body.counters.enterTotal).toBe(1);
  });

  it('sets CORS headers for allowed origins only', async () => {
    const { app } = createTestApp();
    const allowed = await request(app)
      .options('/api/tracking/lesson/enter')
      .set('Origin', 'http://localhost:5173')
      .expect(204);
    expect(allowed.headers['access-control-allow-origin']).toBe('http://localhost:5173');

    const denied = await request(app).get('/health').set('Origin', 'http://evil.test').expect(200);
    expect(denied.headers['access-control-allow-origin']).toBeUndefined();
  });
});
