/**
 * Core calendar types shared by the codec, storage and MCP layers
 */

import type { StorageError } from '../utils/errors.js';

/**
 * One calendar entry. `categoryID` is a key into the category store and is
 * never dereferenced by the codec; ids that no longer exist there are allowed.
 */
export interface CalendarEvent {
  id: string;
  title: string;
  startTime: Date;
  endTime: Date;
  categoryID?: string;
}

/** Calendar day in `yyyy-MM-dd` form */
export type DayKey = string;

export type DayIndex = Map<DayKey, CalendarEvent[]>;

export type RequiredEventProperty = 'SUMMARY' | 'DTSTART' | 'DTEND';

export type DiscardedBlock =
  | { reason: 'missing-fields'; line: number; missing: RequiredEventProperty[] }
  | { reason: 'unterminated'; line: number };

export interface DecodeResult {
  events: CalendarEvent[];
  discarded: DiscardedBlock[];
  discardedBlockCount: number;
}

export type LoadResult =
  | ({ ok: true } & DecodeResult)
  | { ok: false; error: StorageError };

export type SaveResult =
  | { ok: true; eventCount: number }
  | { ok: false; error: StorageError };

export interface Category {
  id: string;
  name: string;
  isEnabled: boolean;
}

export interface SimilarWordsGroup {
  id: string;
  name: string;
  words: string[];
}

export type SearchMode = 'prefix' | 'suffix' | 'exact' | 'contains' | 'synonym';

export interface SearchResultGroup {
  keyword: string;
  events: CalendarEvent[];
}
