import type { StoreDriver } from '../config.js';
import { Counters } from '../metrics/counters.js';
import { TrackingService } from '../tracking/tracking-service.js';

export interface TrackingContext {
  service: TrackingService;
  counters: Counters;
  storeDriver: StoreDriver;
  startedAt: number;
  now?: () => number;
}
