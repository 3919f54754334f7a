/**
 * Resolves the category keys carried on events. Unknown keys resolve to
 * undefined; they are never treated as corruption.
 */
export interface CategoryLookup {
  lookup(id: string): string | undefined;
}

export interface SimilarWordsLookup {
  /**
   * Words of the first group containing `word`, or `[word]`
   */
  findSimilarWords(word: string): string[];

  getGroups(): ReadonlyArray<{ name: string; words: string[] }>;
}
