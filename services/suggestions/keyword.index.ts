/**
 * Keyword index — words drawn from activity names and descriptions.
 *
 * Tokenization: split on runs of anything that is not a letter or digit.
 * Tokens are keyed by their lower-case form; the first spelling seen
 * (names before descriptions, records in store order) is kept for display.
 */

import type { ActivityMap } from "../search/types.js";

/** Tokens shorter than this are dropped ("and", "the", "PM"). */
export const DEFAULT_MIN_KEYWORD_LENGTH = 4;

const NON_WORD = /[^\p{L}\p{N}]+/u;

/** lower-case key → display spelling, in first-seen order. */
export type KeywordIndex = ReadonlyMap<string, string>;

export interface KeywordIndexOptions {
  minKeywordLength?: number;
}

export function tokenize(text: string): string[] {
  return text.split(NON_WORD).filter((token) => token.length > 0);
}

export function buildKeywordIndex(
  records: ActivityMap,
  options: KeywordIndexOptions = {}
): KeywordIndex {
  const minLength = options.minKeywordLength ?? DEFAULT_MIN_KEYWORD_LENGTH;
  const index = new Map<string, string>();

  for (const record of records.values()) {
    for (const token of [...tokenize(record.name), ...tokenize(record.description)]) {
      if (token.length < minLength) continue;
      const key = token.toLowerCase();
      if (!index.has(key)) index.set(key, token);
    }
  }

  return index;
}
