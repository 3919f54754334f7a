/**
 * Calendar Manager - owns the event collection and its persistence
 * Mutations are validated here and written through a single-writer queue
 */

import { randomUUID } from 'crypto';
import { EventStorage } from '../interfaces/EventStorage.js';
import { SimilarWordsLookup } from '../interfaces/CategoryLookup.js';
import {
  CalendarEvent,
  DayIndex,
  DayKey,
  LoadResult,
  SaveResult,
  SearchMode,
  SearchResultGroup
} from '../types/calendar.js';
import { buildDayIndex, eventsForDay, sliceDayIndex } from '../codec/dayIndex.js';
import { encodeCalendar, EncodeOptions } from '../codec/encoder.js';
import { searchEvents, groupSearchResults } from './eventSearch.js';
import { EventNotFoundError, EventValidationError } from '../utils/errors.js';
import { DEFAULT_TIME_ZONE, isEncodableInstant } from '../utils/timezone.js';

export interface CalendarManagerConfig {
  timeZone: string;
  encodeOptions: Pick<EncodeOptions, 'productId' | 'includeUid'>;
}

export interface NewEventInput {
  title: string;
  startTime: Date;
  endTime: Date;
  categoryID?: string;
}

/** `categoryID: null` clears the category */
export interface EventPatch {
  title?: string;
  startTime?: Date;
  endTime?: Date;
  categoryID?: string | null;
}

export interface MutationResult {
  event: CalendarEvent;
  save: SaveResult;
}

export class CalendarManager {
  private events: Map<string, CalendarEvent> = new Map();
  private storage: EventStorage;
  private similarWords?: SimilarWordsLookup;
  private config: CalendarManagerConfig;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(storage: EventStorage, config?: Partial<CalendarManagerConfig>, similarWords?: SimilarWordsLookup) {
    this.storage = storage;
    this.similarWords = similarWords;
    this.config = {
      timeZone: DEFAULT_TIME_ZONE,
      encodeOptions: {},
      ...config
    };
  }

  /**
   * Replace the in-memory collection with the stored one.
   * On a read failure the current collection is left untouched.
   */
  async load(): Promise<LoadResult> {
    const result = await this.storage.load();
    if (!result.ok) {
      return result;
    }

    const loaded = new Map<string, CalendarEvent>();
    for (const event of result.events) {
      if (loaded.has(event.id)) {
        console.warn(`Duplicate event ID '${event.id}' in ${this.storage.describe()}, keeping the last occurrence`);
      }
      loaded.set(event.id, event);
    }
    this.events = loaded;

    console.error(`Loaded ${loaded.size} events from ${this.storage.describe()}`);
    return result;
  }

  async addEvent(input: NewEventInput): Promise<MutationResult> {
    const event: CalendarEvent = {
      id: randomUUID(),
      title: input.title,
      startTime: input.startTime,
      endTime: input.endTime
    };
    if (input.categoryID !== undefined) {
      event.categoryID = input.categoryID;
    }

    this.validateEvent(event);
    this.events.set(event.id, event);

    return { event: { ...event }, save: await this.persist() };
  }

  async updateEvent(eventId: string, patch: EventPatch): Promise<MutationResult> {
    const existing = this.events.get(eventId);
    if (!existing) {
      throw new EventNotFoundError(eventId);
    }

    const updated: CalendarEvent = {
      id: existing.id,
      title: patch.title ?? existing.title,
      startTime: patch.startTime ?? existing.startTime,
      endTime: patch.endTime ?? existing.endTime
    };
    const categoryID = patch.categoryID === undefined ? existing.categoryID : patch.categoryID;
    if (categoryID !== null && categoryID !== undefined) {
      updated.categoryID = categoryID;
    }

    this.validateEvent(updated);
    this.events.set(eventId, updated);

    return { event: { ...updated }, save: await this.persist() };
  }

  async deleteEvent(eventId: string): Promise<MutationResult> {
    const existing = this.events.get(eventId);
    if (!existing) {
      throw new EventNotFoundError(eventId);
    }

    this.events.delete(eventId);
    return { event: existing, save: await this.persist() };
  }

  getEvent(eventId: string): CalendarEvent | undefined {
    const event = this.events.get(eventId);
    return event ? { ...event } : undefined;
  }

  getEvents(): CalendarEvent[] {
    return Array.from(this.events.values(), event => ({ ...event }));
  }

  getEventCount(): number {
    return this.events.size;
  }

  getTimeZone(): string {
    return this.config.timeZone;
  }

  getDayIndex(): DayIndex {
    return buildDayIndex(this.getEvents(), { timeZone: this.config.timeZone });
  }

  getEventsForDay(dayKey: DayKey): CalendarEvent[] {
    return eventsForDay(this.getDayIndex(), dayKey);
  }

  /**
   * Day buckets between two day keys, both inclusive
   */
  getEventsInRange(startDay?: DayKey, endDay?: DayKey): DayIndex {
    return sliceDayIndex(this.getDayIndex(), startDay, endDay);
  }

  searchEvents(query: string, mode: SearchMode = 'contains'): SearchResultGroup[] {
    const matches = searchEvents(this.getEvents(), query, mode, this.similarWords);
    return groupSearchResults(matches, query, this.similarWords?.getGroups() ?? []);
  }

  /**
   * Number of events per category key; uncategorized events are not counted
   */
  countEventsByCategory(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const event of this.events.values()) {
      if (event.categoryID !== undefined) {
        counts.set(event.categoryID, (counts.get(event.categoryID) ?? 0) + 1);
      }
    }
    return counts;
  }

  exportCalendar(): string {
    return encodeCalendar(this.events.values(), this.config.encodeOptions);
  }

  /**
   * Resolves once every save queued so far has finished
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private validateEvent(event: CalendarEvent): void {
    if (event.title.trim() === '') {
      throw new EventValidationError('Event title must not be empty');
    }
    if (isNaN(event.startTime.getTime()) || isNaN(event.endTime.getTime())) {
      throw new EventValidationError('Event start and end must be valid dates');
    }
    if (!isEncodableInstant(event.startTime) || !isEncodableInstant(event.endTime)) {
      throw new EventValidationError('Event start and end must fall between the years 0000 and 9999');
    }
    if (event.startTime.getTime() > event.endTime.getTime()) {
      throw new EventValidationError('Event end must not be before its start');
    }
    // the decoder splits lines on \r
    if (event.title.includes('\r') || event.categoryID?.includes('\r')) {
      throw new EventValidationError('Event title and category must not contain a carriage return');
    }
  }

  /**
   * Queue a save of the current collection behind any save still in flight.
   * The snapshot is taken now, so the last queued save holds the latest state.
   */
  private persist(): Promise<SaveResult> {
    const snapshot = this.getEvents();
    const write = this.writeQueue.then(() => this.storage.save(snapshot));

    // the caller gets the outcome from `write`; the queue only needs to advance
    this.writeQueue = write.then(
      () => undefined,
      error => {
        console.error('Failed to save calendar:', error);
      }
    );

    return write;
  }
}
