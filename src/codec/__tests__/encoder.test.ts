import { describe, it, expect } from 'vitest';
import { encodeCalendar, DEFAULT_PRODUCT_ID } from '../encoder.js';
import type { CalendarEvent } from '../../types/calendar.js';

const NOW = new Date('2025-05-01T12:00:00Z');

function makeEvent(overrides: Partial<CalendarEvent> = {}): CalendarEvent {
  return {
    id: 'evt-1',
    title: 'Planning',
    startTime: new Date('2025-05-10T09:00:00Z'),
    endTime: new Date('2025-05-10T10:00:00Z'),
    ...overrides
  };
}

describe('encodeCalendar', () => {
  it('should write the full document for one event', () => {
    const text = encodeCalendar(
      [makeEvent({ title: 'Meeting; Q&A, notes\nline2', categoryID: 'cat-1' })],
      { now: NOW, generateUid: () => 'uid-1' }
    );

    expect(text).toBe(
      [
        'BEGIN:VCALENDAR',
        'VERSION:2.0',
        `PRODID:${DEFAULT_PRODUCT_ID}`,
        'BEGIN:VEVENT',
        'X-EVENT-ID:evt-1',
        'UID:uid-1',
        'DTSTAMP:20250501T120000Z',
        'DTSTART:20250510T090000Z',
        'DTEND:20250510T100000Z',
        'SUMMARY:Meeting\\; Q&A\\, notes\\nline2',
        'CATEGORIES:cat-1',
        'END:VEVENT',
        'END:VCALENDAR'
      ].join('\n')
    );
  });

  it('should write only the envelope for an empty collection', () => {
    expect(encodeCalendar([], { now: NOW })).toBe(
      ['BEGIN:VCALENDAR', 'VERSION:2.0', `PRODID:${DEFAULT_PRODUCT_ID}`, 'END:VCALENDAR'].join('\n')
    );
  });

  it('should omit CATEGORIES when the event has no category', () => {
    const lines = encodeCalendar([makeEvent()], { now: NOW }).split('\n');
    expect(lines.some(line => line.startsWith('CATEGORIES'))).toBe(false);
  });

  it('should omit UID when disabled', () => {
    const lines = encodeCalendar([makeEvent()], { now: NOW, includeUid: false }).split('\n');
    expect(lines.some(line => line.startsWith('UID'))).toBe(false);
    expect(lines[4]).toBe('X-EVENT-ID:evt-1');
    expect(lines[5]).toBe('DTSTAMP:20250501T120000Z');
  });

  it('should use a custom product id', () => {
    const lines = encodeCalendar([], { now: NOW, productId: '-//test//EN' }).split('\n');
    expect(lines[2]).toBe('PRODID:-//test//EN');
  });

  it('should write events in iteration order with a fresh UID each', () => {
    let counter = 0;
    const text = encodeCalendar(
      [makeEvent({ id: 'b' }), makeEvent({ id: 'a' })],
      { now: NOW, generateUid: () => `uid-${++counter}` }
    );

    const lines = text.split('\n');
    expect(lines.filter(line => line.startsWith('X-EVENT-ID:'))).toEqual(['X-EVENT-ID:b', 'X-EVENT-ID:a']);
    expect(lines.filter(line => line.startsWith('UID:'))).toEqual(['UID:uid-1', 'UID:uid-2']);
  });

  it('should escape category keys', () => {
    const lines = encodeCalendar([makeEvent({ categoryID: 'work,home' })], { now: NOW }).split('\n');
    expect(lines).toContain('CATEGORIES:work\\,home');
  });

  it('should throw for an event with an invalid date', () => {
    expect(() => encodeCalendar([makeEvent({ startTime: new Date('invalid') })], { now: NOW })).toThrow('Invalid date');
  });
});
