import { tokenize } from './in_memory_store.js';
import type { DeepEntry, DeepSearchQuery, RelevanceFunction } from './types.js';

/**
 * Baseline ranking: fraction of query terms found in the content plus the
 * fraction of query tags carried by the entry. Each part is in [0, 1].
 * A query with neither text nor tags scores every entry 0 and matches all.
 */
export const keywordRelevance: RelevanceFunction = (entry: DeepEntry, query: DeepSearchQuery): number => {
  let score = 0;
  const terms = query.text === undefined ? [] : tokenize(query.text);
  if (terms.length > 0) {
    const words = new Set(tokenize(entry.content));
    for (const tag of entry.tags) {
      for (const token of tokenize(tag)) words.add(token);
    }
    score += terms.filter((term) => words.has(term)).length / terms.length;
  }
  const tags = query.tags ?? [];
  if (tags.length > 0) {
    const entryTags = new Set(entry.tags.map((tag) => tag.toLowerCase()));
    score += tags.filter((tag) => entryTags.has(tag.toLowerCase())).length / tags.length;
  }
  return score;
};

export function hasCriteria(query: DeepSearchQuery): boolean {
  const hasText = query.text !== undefined && tokenize(query.text).length > 0;
  const hasTags = (query.tags ?? []).length > 0;
  return hasText || hasTags;
}
