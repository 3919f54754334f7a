/**
 * Serializes calendar events into the events.ics document format
 */

import { randomUUID } from 'crypto';
import type { CalendarEvent } from '../types/calendar.js';
import { escapeText } from '../utils/icsText.js';
import { formatInstant } from '../utils/timezone.js';

export const DEFAULT_PRODUCT_ID = '-//pocket-calendar//EN';

export interface EncodeOptions {
  /** Instant written as DTSTAMP on every block; defaults to the time of the call */
  now?: Date;
  generateUid?: () => string;
  productId?: string;
  /**
   * UID is regenerated on every save and never read back. It is kept by
   * default so that generic iCalendar readers accept the file.
   */
  includeUid?: boolean;
}

/**
 * Produces a complete VCALENDAR document, one VEVENT block per event in
 * iteration order. Lines are joined with `\n` and never folded.
 */
export function encodeCalendar(events: Iterable<CalendarEvent>, options: EncodeOptions = {}): string {
  const generateUid = options.generateUid ?? randomUUID;
  const includeUid = options.includeUid ?? true;
  const timestamp = formatInstant(options.now ?? new Date());

  const lines = ['BEGIN:VCALENDAR', 'VERSION:2.0', `PRODID:${options.productId ?? DEFAULT_PRODUCT_ID}`];

  for (const event of events) {
    lines.push('BEGIN:VEVENT');
    lines.push(`X-EVENT-ID:${event.id}`);
    if (includeUid) {
      lines.push(`UID:${generateUid()}`);
    }
    lines.push(`DTSTAMP:${timestamp}`);
    lines.push(`DTSTART:${formatInstant(event.startTime)}`);
    lines.push(`DTEND:${formatInstant(event.endTime)}`);
    lines.push(`SUMMARY:${escapeText(event.title)}`);
    if (event.categoryID !== undefined) {
      lines.push(`CATEGORIES:${escapeText(event.categoryID)}`);
    }
    lines.push('END:VEVENT');
  }

  lines.push('END:VCALENDAR');
  return lines.join('\n');
}
