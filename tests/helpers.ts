import { createApp } from '../src/server/app.js';
import { DisabledLessonGateway, type LessonContentGateway } from '../src/server/enrichment/lesson-gateway.js';
import { Counters } from '../src/server/metrics/counters.js';
import { MemoryTrackingStore } from '../src/server/persistence/memory-store.js';
import type { TrackingStore } from '../src/server/persistence/record-store.js';
import { TrackingService } from '../src/server/tracking/tracking-service.js';

export const T0 = Date.UTC(2025, 0, 1, 10, 0, 0);

export function createTestApp(options: { store?: TrackingStore; lessons?: LessonContentGateway } = {}) {
  let now = T0;
  const store = options.store ?? new MemoryTrackingStore();
  const counters = new Counters();
  const service = new TrackingService({
    store,
    lessons: options.lessons ?? new DisabledLessonGateway(),
    counters,
    clock: () => now
  });
  const app = createApp(
    { service, counters, storeDriver: 'memory', startedAt: T0, now: () => now },
    { corsOrigins: ['http://localhost:5173'] }
  );
  return { app, store, counters, advance: (ms: number) => { now += ms; } };
}
