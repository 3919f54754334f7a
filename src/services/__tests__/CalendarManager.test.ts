import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CalendarManager, NewEventInput } from '../CalendarManager.js';
import type { EventStorage } from '../../interfaces/EventStorage.js';
import type { SimilarWordsLookup } from '../../interfaces/CategoryLookup.js';
import type { CalendarEvent, LoadResult, SaveResult } from '../../types/calendar.js';
import { EventNotFoundError, EventValidationError, StorageError } from '../../utils/errors.js';

class MemoryStorage implements EventStorage {
  saves: CalendarEvent[][] = [];
  loadResult: LoadResult = { ok: true, events: [], discarded: [], discardedBlockCount: 0 };
  failSaves = false;

  async load(): Promise<LoadResult> {
    return this.loadResult;
  }

  async save(events: readonly CalendarEvent[]): Promise<SaveResult> {
    this.saves.push([...events]);
    if (this.failSaves) {
      return { ok: false, error: new StorageError('WRITE_FAILED', 'memory', new Error('disk full')) };
    }
    return { ok: true, eventCount: events.length };
  }

  describe(): string {
    return 'memory';
  }
}

function input(title: string, start = '2025-05-10T09:00:00Z', end = '2025-05-10T10:00:00Z'): NewEventInput {
  return { title, startTime: new Date(start), endTime: new Date(end) };
}

function stored(id: string, title: string, start: string, categoryID?: string): CalendarEvent {
  const event: CalendarEvent = { id, title, startTime: new Date(start), endTime: new Date(start) };
  if (categoryID) {
    event.categoryID = categoryID;
  }
  return event;
}

describe('CalendarManager', () => {
  let storage: MemoryStorage;
  let manager: CalendarManager;

  beforeEach(() => {
    storage = new MemoryStorage();
    manager = new CalendarManager(storage);
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('load', () => {
    it('should replace the collection with the stored events', async () => {
      await manager.addEvent(input('Scratch'));
      storage.loadResult = {
        ok: true,
        events: [stored('a', 'Stored', '2025-05-10T09:00:00Z')],
        discarded: [],
        discardedBlockCount: 0
      };

      const result = await manager.load();

      expect(result.ok).toBe(true);
      expect(manager.getEvents().map(e => e.id)).toEqual(['a']);
    });

    it('should keep the last of two events with the same id', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      storage.loadResult = {
        ok: true,
        events: [stored('dup', 'First', '2025-05-10T09:00:00Z'), stored('dup', 'Second', '2025-05-10T09:00:00Z')],
        discarded: [],
        discardedBlockCount: 0
      };

      await manager.load();

      expect(manager.getEvent('dup')?.title).toBe('Second');
      expect(manager.getEventCount()).toBe(1);
      expect(warnSpy).toHaveBeenCalledWith("Duplicate event ID 'dup' in memory, keeping the last occurrence");
    });

    it('should leave the collection untouched when the read fails', async () => {
      await manager.addEvent(input('Keep me'));
      storage.loadResult = { ok: false, error: new StorageError('READ_FAILED', 'memory', new Error('EACCES')) };

      const result = await manager.load();

      expect(result.ok).toBe(false);
      expect(manager.getEvents().map(e => e.title)).toEqual(['Keep me']);
    });
  });

  describe('mutations', () => {
    it('should add an event and save the whole collection', async () => {
      const { event, save } = await manager.addEvent({ ...input('Dentist'), categoryID: 'health' });

      expect(event.title).toBe('Dentist');
      expect(event.categoryID).toBe('health');
      expect(save).toEqual({ ok: true, eventCount: 1 });
      expect(storage.saves).toEqual([[event]]);
      expect(manager.getEvent(event.id)).toEqual(event);
    });

    it('should allow an event that ends when it starts', async () => {
      const { event } = await manager.addEvent(input('Instant', '2025-05-10T09:00:00Z', '2025-05-10T09:00:00Z'));
      expect(manager.getEvent(event.id)).toBeDefined();
    });

    it('should reject invalid events without saving', async () => {
      await expect(manager.addEvent(input('   '))).rejects.toThrow(EventValidationError);
      await expect(manager.addEvent(input('Backwards', '2025-05-10T10:00:00Z', '2025-05-10T09:00:00Z'))).rejects.toThrow(
        'Event end must not be before its start'
      );
      await expect(manager.addEvent(input('Broken', 'garbage'))).rejects.toThrow(
        'Event start and end must be valid dates'
      );

      expect(manager.getEventCount()).toBe(0);
      expect(storage.saves).toEqual([]);
    });

    it('should reject times the calendar file cannot hold', async () => {
      const message = 'Event start and end must fall between the years 0000 and 9999';

      await expect(
        manager.addEvent(input('Far future', '+010000-01-01T00:00:00Z', '+010000-01-01T01:00:00Z'))
      ).rejects.toThrow(message);
      await expect(
        manager.addEvent(input('Far past', '-000001-06-01T00:00:00Z', '2025-05-10T10:00:00Z'))
      ).rejects.toThrow(message);

      const { event } = await manager.addEvent(input('Last day', '9999-12-31T23:00:00Z', '9999-12-31T23:59:59Z'));
      await expect(
        manager.updateEvent(event.id, { endTime: new Date('+010000-01-01T00:00:00Z') })
      ).rejects.toThrow(EventValidationError);

      expect(manager.getEvents().map(e => e.title)).toEqual(['Last day']);
      expect(storage.saves).toHaveLength(1);
    });

    it('should reject carriage returns in the title or category', async () => {
      const message = 'Event title and category must not contain a carriage return';

      await expect(manager.addEvent(input('a\rb'))).rejects.toThrow(message);
      await expect(manager.addEvent({ ...input('Tagged'), categoryID: 'work\r' })).rejects.toThrow(message);

      const { event } = await manager.addEvent(input('Multi\nline'));
      expect(event.title).toBe('Multi\nline');
      expect(manager.getEventCount()).toBe(1);
    });

    it('should update only the given fields', async () => {
      const { event } = await manager.addEvent({ ...input('Draft'), categoryID: 'work' });

      const { event: updated } = await manager.updateEvent(event.id, { title: 'Final' });

      expect(updated).toEqual({ ...event, title: 'Final' });
    });

    it('should clear the category when patched with null', async () => {
      const { event } = await manager.addEvent({ ...input('Tagged'), categoryID: 'work' });

      const { event: updated } = await manager.updateEvent(event.id, { categoryID: null });

      expect(updated).not.toHaveProperty('categoryID');
    });

    it('should validate the merged event on update', async () => {
      const { event } = await manager.addEvent(input('Meeting'));

      await expect(
        manager.updateEvent(event.id, { endTime: new Date('2025-05-10T08:00:00Z') })
      ).rejects.toThrow(EventValidationError);
      expect(manager.getEvent(event.id)).toEqual(event);
    });

    it('should throw for unknown events', async () => {
      await expect(manager.updateEvent('missing', { title: 'x' })).rejects.toThrow(EventNotFoundError);
      await expect(manager.deleteEvent('missing')).rejects.toThrow("Event with ID 'missing' not found");
    });

    it('should delete an event and save the remainder', async () => {
      const { event: first } = await manager.addEvent(input('First'));
      const { event: second } = await manager.addEvent(input('Second'));

      const { save } = await manager.deleteEvent(first.id);

      expect(save).toEqual({ ok: true, eventCount: 1 });
      expect(manager.getEvents()).toEqual([second]);
    });

    it('should keep the change in memory and report a failed save', async () => {
      storage.failSaves = true;

      const { event, save } = await manager.addEvent(input('Unsaved'));

      expect(save.ok).toBe(false);
      if (!save.ok) {
        expect(save.error.code).toBe('WRITE_FAILED');
      }
      expect(manager.getEvent(event.id)?.title).toBe('Unsaved');
    });

    it('should not let callers change stored events through returned copies', async () => {
      const { event } = await manager.addEvent(input('Original'));
      event.title = 'Changed';
      manager.getEvents()[0].title = 'Changed again';

      expect(manager.getEvent(event.id)?.title).toBe('Original');
    });
  });

  describe('save ordering', () => {
    it('should run one save at a time in call order', async () => {
      const log: string[] = [];
      const gates: Array<() => void> = [];
      const gated: EventStorage = {
        load: async () => ({ ok: true, events: [], discarded: [], discardedBlockCount: 0 }),
        save: async events => {
          log.push(`start:${events.length}`);
          await new Promise<void>(resolve => gates.push(resolve));
          log.push(`end:${events.length}`);
          return { ok: true, eventCount: events.length };
        },
        describe: () => 'gated'
      };
      const serialized = new CalendarManager(gated);

      const first = serialized.addEvent(input('A'));
      const second = serialized.addEvent(input('B'));

      await vi.waitFor(() => expect(gates).toHaveLength(1));
      expect(log).toEqual(['start:1']);

      gates[0]();
      await first;
      await vi.waitFor(() => expect(gates).toHaveLength(2));
      expect(log).toEqual(['start:1', 'end:1', 'start:2']);

      gates[1]();
      await second;
      await serialized.flush();
      expect(log).toEqual(['start:1', 'end:1', 'start:2', 'end:2']);
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      storage.loadResult = {
        ok: true,
        events: [
          stored('late', 'Team meeting', '2025-05-10T22:00:00Z', 'work'),
          stored('early', 'Breakfast', '2025-05-10T07:00:00Z'),
          stored('next', 'Weekly sync', '2025-05-12T10:00:00Z', 'work'),
          stored('prev', 'Gym', '2025-05-09T18:00:00Z', 'health')
        ],
        discarded: [],
        discardedBlockCount: 0
      };
      await manager.load();
    });

    it('should list a day in start order', () => {
      expect(manager.getEventsForDay('2025-05-10').map(e => e.id)).toEqual(['early', 'late']);
      expect(manager.getEventsForDay('2025-05-11')).toEqual([]);
    });

    it('should slice days by an inclusive range', () => {
      expect(Array.from(manager.getEventsInRange('2025-05-10', '2025-05-12').keys())).toEqual([
        '2025-05-10',
        '2025-05-12'
      ]);
    });

    it('should assign days in the configured zone', async () => {
      const tokyo = new CalendarManager(storage, { timeZone: 'Asia/Tokyo' });
      await tokyo.load();

      expect(tokyo.getTimeZone()).toBe('Asia/Tokyo');
      expect(tokyo.getEventsForDay('2025-05-11').map(e => e.id)).toEqual(['late']);
    });

    it('should count events per category', () => {
      expect(Object.fromEntries(manager.countEventsByCategory())).toEqual({ work: 2, health: 1 });
    });

    it('should group synonym matches by similar-words group', async () => {
      const similarWords: SimilarWordsLookup = {
        findSimilarWords: word => (word === 'sync' ? ['meeting', 'sync'] : [word]),
        getGroups: () => [{ name: 'Meetings', words: ['meeting', 'sync'] }]
      };
      const searching = new CalendarManager(storage, {}, similarWords);
      await searching.load();

      const groups = searching.searchEvents('sync', 'synonym');

      expect(groups).toHaveLength(1);
      expect(groups[0].keyword).toBe('Meetings');
      expect(groups[0].events.map(e => e.id)).toEqual(['late', 'next']);
    });

    it('should export the collection with the configured encode options', async () => {
      const exporting = new CalendarManager(storage, { encodeOptions: { productId: '-//test//EN', includeUid: false } });
      await exporting.load();

      const lines = exporting.exportCalendar().split('\n');

      expect(lines[2]).toBe('PRODID:-//test//EN');
      expect(lines.filter(line => line.startsWith('X-EVENT-ID:'))).toEqual([
        'X-EVENT-ID:late',
        'X-EVENT-ID:early',
        'X-EVENT-ID:next',
        'X-EVENT-ID:prev'
      ]);
      expect(lines.some(line => line.startsWith('UID:'))).toBe(false);
    });
  });
});
