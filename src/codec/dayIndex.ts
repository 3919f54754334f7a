/**
 * Groups events into calendar-day buckets
 */

import type { CalendarEvent, DayIndex, DayKey } from '../types/calendar.js';
import { DEFAULT_TIME_ZONE, toDayKey } from '../utils/timezone.js';

export interface DayIndexOptions {
  /** IANA zone in which a start instant is assigned to a day */
  timeZone?: string;
}

/**
 * Builds day key -> events. Keys come out in ascending day order and each
 * bucket is sorted by start time; the sort is stable, so events starting at
 * the same instant keep their input order.
 */
export function buildDayIndex(events: Iterable<CalendarEvent>, options: DayIndexOptions = {}): DayIndex {
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
  const buckets = new Map<DayKey, CalendarEvent[]>();

  for (const event of events) {
    const key = toDayKey(event.startTime, timeZone);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(event);
    } else {
      buckets.set(key, [event]);
    }
  }

  const index: DayIndex = new Map();
  for (const key of Array.from(buckets.keys()).sort()) {
    const bucket = buckets.get(key) ?? [];
    bucket.sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
    index.set(key, bucket);
  }
  return index;
}

export function eventsForDay(index: DayIndex, dayKey: DayKey): CalendarEvent[] {
  return index.get(dayKey) ?? [];
}

/**
 * Buckets whose day falls within `[startDay, endDay]`
 */
export function sliceDayIndex(index: DayIndex, startDay?: DayKey, endDay?: DayKey): DayIndex {
  const slice: DayIndex = new Map();
  for (const [key, events] of index) {
    if ((startDay === undefined || key >= startDay) && (endDay === undefined || key <= endDay)) {
      slice.set(key, events);
    }
  }
  return slice;
}
