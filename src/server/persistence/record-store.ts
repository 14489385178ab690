import type { UserTrackingRecord } from '../types.js';

/**
 * Key-value access to tracking records keyed by user id. `save` replaces the whole
 * record (upsert); concurrent writers to the same user are last-writer-wins.
 */
export interface TrackingStore {
  load(userId: string): Promise<UserTrackingRecord | null>;
  save(record: UserTrackingRecord): Promise<void>;
  remove(userId: string): Promise<boolean>;
}
