import type { TrackingMetrics } from '../types.js';

export class Counters implements TrackingMetrics {
  enterTotal = 0;
  exitTotal = 0;
  focusTotal = 0;
  focusNotFoundTotal = 0;
  storeErrorTotal = 0;
  enrichmentMissTotal = 0;

  snapshot(): TrackingMetrics {
    return {
      enterTotal: this.enterTotal,
      exitTotal: this.exitTotal,
      focusTotal: this.focusTotal,
      focusNotFoundTotal: this.focusNotFoundTotal,
      storeErrorTotal: this.storeErrorTotal,
      enrichmentMissTotal: this.enrichmentMissTotal
    };
  }
}
