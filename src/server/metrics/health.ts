import type { StoreDriver } from '../config.js';
import { Counters } from './counters.js';

export const SERVICE_NAME = 'tracking-service';
export const SERVICE_VERSION = '1.0.0';

export function buildLiveness() {
  return { status: 'healthy', service: SERVICE_NAME, version: SERVICE_VERSION };
}

export function buildTrackingStatus(counters: Counters, storeDriver: StoreDriver, startedAt: number, now: number) {
  return {
    ...buildLiveness(),
    store: storeDriver,
    uptimeMs: now - startedAt,
    counters: counters.snapshot()
  };
}
