/**
 * Parses events.ics documents back into calendar events.
 *
 * Decoding is best effort: a block that lacks SUMMARY, DTSTART or DTEND when
 * it closes, or that never closes, is dropped and reported in `discarded`.
 * Malformed input never makes the decoder throw.
 */

import { randomUUID } from 'crypto';
import type { CalendarEvent, DecodeResult, DiscardedBlock, RequiredEventProperty } from '../types/calendar.js';
import { unescapeText } from '../utils/icsText.js';
import { parseInstantField } from '../utils/timezone.js';

export interface DecodeOptions {
  /** Supplies ids for blocks without X-EVENT-ID */
  generateId?: () => string;
}

interface BlockScratch {
  line: number;
  title?: string;
  start?: Date;
  end?: Date;
  categoryID?: string;
  id?: string;
}

const LINE_BREAK = /\r\n|\r|\n/;

export function decodeCalendar(text: string, options: DecodeOptions = {}): DecodeResult {
  const generateId = options.generateId ?? randomUUID;
  const events: CalendarEvent[] = [];
  const discarded: DiscardedBlock[] = [];

  let block: BlockScratch | null = null;
  // depth of components nested inside the open VEVENT (VALARM and the like)
  let nestedDepth = 0;

  const lines = text.split(LINE_BREAK);
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index].trim();
    if (line === '') {
      continue;
    }

    if (line === 'BEGIN:VEVENT') {
      if (block) {
        discarded.push({ reason: 'unterminated', line: block.line });
      }
      block = { line: index + 1 };
      nestedDepth = 0;
      continue;
    }

    if (!block) {
      continue;
    }

    if (line === 'END:VEVENT') {
      const event = completeBlock(block, generateId, discarded);
      if (event) {
        events.push(event);
      }
      block = null;
      nestedDepth = 0;
      continue;
    }

    if (line.startsWith('BEGIN:')) {
      nestedDepth++;
    } else if (line.startsWith('END:')) {
      nestedDepth = Math.max(0, nestedDepth - 1);
    } else if (nestedDepth === 0) {
      readProperty(block, line);
    }
  }

  if (block) {
    discarded.push({ reason: 'unterminated', line: block.line });
  }

  return { events, discarded, discardedBlockCount: discarded.length };
}

function readProperty(block: BlockScratch, line: string): void {
  if (line.startsWith('SUMMARY:')) {
    block.title = unescapeText(line.slice('SUMMARY:'.length));
  } else if (line.startsWith('DTSTART')) {
    block.start = parseInstantField(line);
  } else if (line.startsWith('DTEND')) {
    block.end = parseInstantField(line);
  } else if (line.startsWith('CATEGORIES:')) {
    const categoryID = unescapeText(line.slice('CATEGORIES:'.length));
    block.categoryID = categoryID === '' ? undefined : categoryID;
  } else if (line.startsWith('X-EVENT-ID:')) {
    const id = line.slice('X-EVENT-ID:'.length);
    block.id = id === '' ? undefined : id;
  }
}

function completeBlock(
  block: BlockScratch,
  generateId: () => string,
  discarded: DiscardedBlock[]
): CalendarEvent | null {
  const { title, start, end } = block;

  if (title === undefined || start === undefined || end === undefined) {
    const missing: RequiredEventProperty[] = [];
    if (title === undefined) missing.push('SUMMARY');
    if (start === undefined) missing.push('DTSTART');
    if (end === undefined) missing.push('DTEND');
    discarded.push({ reason: 'missing-fields', line: block.line, missing });
    return null;
  }

  const event: CalendarEvent = {
    id: block.id ?? generateId(),
    title,
    startTime: start,
    endTime: end
  };
  if (block.categoryID !== undefined) {
    event.categoryID = block.categoryID;
  }
  return event;
}
