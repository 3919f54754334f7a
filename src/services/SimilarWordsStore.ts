/**
 * Similar Words Store - groups of interchangeable words used by synonym search
 */

import { randomUUID } from 'crypto';
import { Ajv, type ValidateFunction } from 'ajv';
import { SimilarWordsGroup } from '../types/calendar.js';
import { SimilarWordsLookup } from '../interfaces/CategoryLookup.js';
import { readJsonFile, writeJsonFile } from '../utils/jsonFile.js';
import { errorMessage } from '../utils/errors.js';

export const DEFAULT_SIMILAR_WORDS_FILE = 'similar-words.json';

const DEFAULT_GROUPS: ReadonlyArray<{ name: string; words: string[] }> = [
  { name: 'Meetings', words: ['meeting', 'standup', 'sync', 'call', 'review'] },
  { name: 'Meals', words: ['lunch', 'dinner', 'breakfast', 'meal', 'brunch'] },
  { name: 'Exercise', words: ['gym', 'workout', 'running', 'yoga', 'walk'] },
  { name: 'Shopping', words: ['shopping', 'groceries', 'errands', 'purchase'] },
  { name: 'Study', words: ['study', 'reading', 'lecture', 'course', 'workshop'] }
];

const GROUPS_SCHEMA = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      id: { type: 'string', minLength: 1 },
      name: { type: 'string' },
      words: { type: 'array', items: { type: 'string' } }
    },
    required: ['id', 'name', 'words']
  }
};

export class SimilarWordsStore implements SimilarWordsLookup {
  private filePath: string;
  private groups: SimilarWordsGroup[] = [];
  private validateGroups: ValidateFunction<SimilarWordsGroup[]>;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.validateGroups = new Ajv({ allErrors: true }).compile<SimilarWordsGroup[]>(GROUPS_SCHEMA);
  }

  /**
   * Load groups from disk. A missing or unreadable file is replaced by the default groups.
   */
  async load(): Promise<SimilarWordsGroup[]> {
    let data: unknown;
    try {
      data = await readJsonFile(this.filePath);
    } catch (error) {
      console.error(`Failed to load similar words from ${this.filePath}: ${errorMessage(error)}`);
      data = undefined;
    }

    if (data !== undefined && this.validateGroups(data)) {
      this.groups = data;
      return this.getGroups();
    }

    if (data !== undefined) {
      console.error(`Ignoring invalid similar words file ${this.filePath}`);
    }

    this.groups = DEFAULT_GROUPS.map(group => ({ id: randomUUID(), name: group.name, words: [...group.words] }));
    await this.save();
    return this.getGroups();
  }

  getGroups(): SimilarWordsGroup[] {
    return this.groups.map(group => ({ ...group, words: [...group.words] }));
  }

  async addGroup(name: string, words: string[]): Promise<SimilarWordsGroup> {
    const group = normalizeGroup({ id: randomUUID(), name, words });
    this.groups.push(group);
    await this.save();
    return { ...group, words: [...group.words] };
  }

  async updateGroup(group: SimilarWordsGroup): Promise<boolean> {
    const index = this.groups.findIndex(g => g.id === group.id);
    if (index === -1) {
      return false;
    }

    this.groups[index] = normalizeGroup(group);
    await this.save();
    return true;
  }

  async removeGroup(id: string): Promise<boolean> {
    const remaining = this.groups.filter(g => g.id !== id);
    if (remaining.length === this.groups.length) {
      return false;
    }

    this.groups = remaining;
    await this.save();
    return true;
  }

  findSimilarWords(word: string): string[] {
    const group = this.findGroup(word);
    return group ? [...group.words] : [word];
  }

  /**
   * Name of the group containing `word`, or the word itself
   */
  getGroupName(word: string): string {
    return this.findGroup(word)?.name ?? word;
  }

  private findGroup(word: string): SimilarWordsGroup | undefined {
    const lowercaseWord = word.toLowerCase();
    return this.groups.find(group => group.words.some(w => w.toLowerCase() === lowercaseWord));
  }

  private async save(): Promise<void> {
    try {
      await writeJsonFile(this.filePath, this.groups);
    } catch (error) {
      throw new Error(`Failed to save similar words: ${errorMessage(error)}`);
    }
  }
}

/**
 * Trims the name and words and drops blank words
 */
function normalizeGroup(group: SimilarWordsGroup): SimilarWordsGroup {
  const name = group.name.trim();
  const words = group.words.map(word => word.trim()).filter(word => word !== '');
  if (name === '') {
    throw new Error('Similar-word group name must not be empty');
  }
  if (words.length === 0) {
    throw new Error('Similar-word group must contain at least one word');
  }
  return { id: group.id, name, words };
}
