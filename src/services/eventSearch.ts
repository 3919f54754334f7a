/**
 * Keyword search over event titles
 */

import type { CalendarEvent, SearchMode, SearchResultGroup } from '../types/calendar.js';
import type { SimilarWordsLookup } from '../interfaces/CategoryLookup.js';

export const SEARCH_MODES: readonly SearchMode[] = ['prefix', 'suffix', 'exact', 'contains', 'synonym'];

/**
 * Finds events whose title matches `query` under the given mode.
 * Matching is case-insensitive. In `synonym` mode the query is expanded to
 * every word of its similar-words group and a title matches when it contains
 * any of them.
 */
export function searchEvents(
  events: Iterable<CalendarEvent>,
  query: string,
  mode: SearchMode = 'contains',
  similarWords?: SimilarWordsLookup
): CalendarEvent[] {
  const normalizedQuery = query.trim().toLowerCase();
  if (normalizedQuery === '') {
    return [];
  }

  const keywords = mode === 'synonym' && similarWords
    ? similarWords.findSimilarWords(normalizedQuery).map(word => word.toLowerCase())
    : [normalizedQuery];

  const matches: CalendarEvent[] = [];
  for (const event of events) {
    if (matchesTitle(event.title.toLowerCase(), keywords, mode)) {
      matches.push(event);
    }
  }
  return matches;
}

function matchesTitle(title: string, keywords: string[], mode: SearchMode): boolean {
  return keywords.some(keyword => {
    switch (mode) {
      case 'prefix':
        return title.startsWith(keyword);
      case 'suffix':
        return title.endsWith(keyword);
      case 'exact':
        return title === keyword;
      case 'contains':
      case 'synonym':
        return title.includes(keyword);
    }
  });
}

/**
 * Buckets search hits under the name of the first group with a word the
 * title contains, or under the query itself. Buckets are ordered by keyword
 * and their events by start time.
 */
export function groupSearchResults(
  events: CalendarEvent[],
  query: string,
  groups: ReadonlyArray<{ name: string; words: string[] }>
): SearchResultGroup[] {
  const fallbackKeyword = query.trim().toLowerCase();
  const buckets = new Map<string, CalendarEvent[]>();

  for (const event of events) {
    const title = event.title.toLowerCase();
    const group = groups.find(candidate => candidate.words.some(word => title.includes(word.toLowerCase())));
    const keyword = group ? group.name : fallbackKeyword;

    const bucket = buckets.get(keyword);
    if (bucket) {
      bucket.push(event);
    } else {
      buckets.set(keyword, [event]);
    }
  }

  return Array.from(buckets, ([keyword, bucketEvents]) => ({
    keyword,
    events: [...bucketEvents].sort((a, b) => a.startTime.getTime() - b.startTime.getTime())
  })).sort((a, b) => (a.keyword < b.keyword ? -1 : a.keyword > b.keyword ? 1 : 0));
}
