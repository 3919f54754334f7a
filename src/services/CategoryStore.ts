/**
 * Category Store - user-defined event categories kept in a JSON file
 */

import { randomUUID } from 'crypto';
import { Ajv, type ValidateFunction } from 'ajv';
import { CalendarEvent, Category } from '../types/calendar.js';
import { CategoryLookup } from '../interfaces/CategoryLookup.js';
import { readJsonFile, writeJsonFile } from '../utils/jsonFile.js';
import { errorMessage } from '../utils/errors.js';

export const DEFAULT_CATEGORIES_FILE = 'categories.json';

/** Entries written before `isEnabled` existed lack the flag */
interface StoredCategory {
  id: string;
  name: string;
  isEnabled?: boolean;
}

const STORED_CATEGORIES_SCHEMA = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      id: { type: 'string', minLength: 1 },
      name: { type: 'string' },
      isEnabled: { type: 'boolean' }
    },
    required: ['id', 'name']
  }
};

export class CategoryStore implements CategoryLookup {
  private filePath: string;
  private categories: Category[] = [];
  private validateStored: ValidateFunction<StoredCategory[]>;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.validateStored = new Ajv({ allErrors: true }).compile<StoredCategory[]>(STORED_CATEGORIES_SCHEMA);
  }

  /**
   * Load categories from disk, upgrading entries from the older format
   */
  async load(): Promise<Category[]> {
    let data: unknown;
    try {
      data = await readJsonFile(this.filePath);
    } catch (error) {
      throw new Error(`Failed to load categories: ${errorMessage(error)}`);
    }

    if (data === undefined) {
      this.categories = [];
      return this.list();
    }

    if (!this.validateStored(data)) {
      const details = this.validateStored.errors?.map(e => `${e.instancePath || 'root'}: ${e.message}`).join(', ');
      throw new Error(`Failed to load categories: invalid category file (${details ?? 'unknown error'})`);
    }

    const needsMigration = data.some(entry => entry.isEnabled === undefined);
    this.categories = data.map(entry => ({
      id: entry.id,
      name: entry.name,
      isEnabled: entry.isEnabled ?? true
    }));

    if (needsMigration) {
      console.warn(`Migrating ${this.filePath} to the current category format`);
      await this.save();
    }

    return this.list();
  }

  list(): Category[] {
    return this.categories.map(category => ({ ...category }));
  }

  async add(name: string): Promise<Category> {
    const trimmed = name.trim();
    if (trimmed === '') {
      throw new Error('Category name must not be empty');
    }

    const category: Category = { id: randomUUID(), name: trimmed, isEnabled: true };
    this.categories.push(category);
    await this.save();
    return { ...category };
  }

  /**
   * Replace the category with the same id. Returns false when there is none.
   */
  async update(category: Category): Promise<boolean> {
    const index = this.categories.findIndex(c => c.id === category.id);
    if (index === -1) {
      return false;
    }

    this.categories[index] = { ...category };
    await this.save();
    return true;
  }

  async remove(id: string): Promise<boolean> {
    const remaining = this.categories.filter(c => c.id !== id);
    if (remaining.length === this.categories.length) {
      return false;
    }

    this.categories = remaining;
    await this.save();
    return true;
  }

  lookup(id: string): string | undefined {
    return this.categories.find(c => c.id === id)?.name;
  }

  idForName(name: string): string | undefined {
    return this.categories.find(c => c.name === name)?.id;
  }

  enabledCategoryIds(): Set<string> {
    return new Set(this.categories.filter(c => c.isEnabled).map(c => c.id));
  }

  /**
   * Drop events whose category is switched off. Uncategorized events always
   * stay; with no categories at all nothing is filtered. A category key the
   * store does not know counts as switched off once any category exists.
   */
  filterVisible(events: CalendarEvent[]): CalendarEvent[] {
    if (this.categories.length === 0) {
      return events;
    }
    const enabled = this.enabledCategoryIds();
    return events.filter(event => event.categoryID === undefined || enabled.has(event.categoryID));
  }

  private async save(): Promise<void> {
    try {
      await writeJsonFile(this.filePath, this.categories);
    } catch (error) {
      throw new Error(`Failed to save categories: ${errorMessage(error)}`);
    }
  }
}
