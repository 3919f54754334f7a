import type { CalendarEvent, LoadResult, SaveResult } from '../types/calendar.js';

/**
 * Interface for the persistence behind a calendar's event collection.
 *
 * Implementations hold no lock: two overlapping `save` calls may interleave
 * and the later rename wins. Callers must serialize writes themselves.
 */
export interface EventStorage {
  /**
   * Read and decode the whole collection. A missing file is an empty
   * collection, not an error.
   */
  load(): Promise<LoadResult>;

  /**
   * Encode and replace the whole collection. Failures are returned, not thrown.
   */
  save(events: readonly CalendarEvent[]): Promise<SaveResult>;

  /**
   * Location of the stored collection, for logging
   */
  describe(): string;
}
