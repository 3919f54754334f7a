import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import { randomUUID } from 'crypto';
import { EventStorage } from '../interfaces/EventStorage.js';
import { CalendarEvent, LoadResult, SaveResult } from '../types/calendar.js';
import { decodeCalendar } from '../codec/decoder.js';
import { encodeCalendar, EncodeOptions } from '../codec/encoder.js';
import { StorageError, isErrnoException } from '../utils/errors.js';

export const DEFAULT_EVENTS_FILE = 'events.ics';

export type FileStorageOptions = Pick<EncodeOptions, 'productId' | 'includeUid' | 'generateUid'>;

/**
 * Event storage backed by a single .ics file.
 * Every save rewrites the whole file through a temporary file and a rename,
 * so readers see either the previous document or the new one.
 */
export class ICalFileStorage implements EventStorage {
  private readonly filePath: string;
  private readonly options: FileStorageOptions;

  constructor(filePath: string, options: FileStorageOptions = {}) {
    this.filePath = filePath;
    this.options = options;
  }

  /**
   * Load events from disk
   */
  async load(): Promise<LoadResult> {
    let content: string;

    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { ok: true, events: [], discarded: [], discardedBlockCount: 0 };
      }
      const storageError = new StorageError('READ_FAILED', this.filePath, error);
      console.error(storageError.message);
      return { ok: false, error: storageError };
    }

    const result = decodeCalendar(content);
    if (result.discardedBlockCount > 0) {
      const lines = result.discarded.map(block => block.line).join(', ');
      console.warn(`Discarded ${result.discardedBlockCount} malformed event block(s) in ${this.filePath} (lines ${lines})`);
    }

    return { ok: true, ...result };
  }

  /**
   * Save events to disk, replacing the previous contents
   */
  async save(events: readonly CalendarEvent[]): Promise<SaveResult> {
    const directory = dirname(this.filePath);
    const tempPath = join(directory, `.${basename(this.filePath)}.${randomUUID()}.tmp`);

    try {
      const content = encodeCalendar(events, this.options);
      await fs.mkdir(directory, { recursive: true });
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);
      return { ok: true, eventCount: events.length };
    } catch (error) {
      await this.removeTempFile(tempPath);
      const storageError = new StorageError('WRITE_FAILED', this.filePath, error);
      console.error(storageError.message);
      return { ok: false, error: storageError };
    }
  }

  describe(): string {
    return this.filePath;
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      console.error(`Failed to remove temporary file ${tempPath}:`, error);
    }
  }
}

/**
 * Reads and decodes a calendar file in one call
 */
export async function loadCalendarFile(filePath: string): Promise<LoadResult> {
  return new ICalFileStorage(filePath).load();
}
