import { compareText } from "../search/stages/sort.stage.js";
import type { ActivityMap, Suggestion, SuggestionKind } from "../search/types.js";
import { buildKeywordIndex, type KeywordIndexOptions } from "./keyword.index.js";

export interface SuggestOptions extends KeywordIndexOptions {
  /** Maximum number of suggestions returned; no cap when omitted. */
  limit?: number;
}

function byText(a: Suggestion, b: Suggestion): number {
  return compareText(a.text, b.text);
}

/** Distinct texts of one kind, ascending. */
function collect(texts: Iterable<string>, kind: SuggestionKind): Suggestion[] {
  const seen = new Set<string>();
  const out: Suggestion[] = [];
  for (const text of texts) {
    if (seen.has(text)) continue;
    seen.add(text);
    out.push({ text, kind });
  }
  return out.sort(byText);
}

/**
 * Autocomplete a partial term against activity names, then against the keyword index.
 * Matching is a case-insensitive substring test. Activity suggestions always come
 * before keyword suggestions. A blank term yields no suggestions.
 */
export function suggest(
  records: ActivityMap,
  term: string,
  options: SuggestOptions = {}
): Suggestion[] {
  const needle = term.trim().toLowerCase();
  if (needle === "") return [];

  const activityNames = [...records.keys()].filter((name) =>
    name.toLowerCase().includes(needle)
  );

  const keywords: string[] = [];
  for (const [key, spelling] of buildKeywordIndex(records, options)) {
    if (key.includes(needle)) keywords.push(spelling);
  }

  const suggestions = [...collect(activityNames, "activity"), ...collect(keywords, "keyword")];

  if (options.limit === undefined) return suggestions;
  return suggestions.slice(0, Math.max(0, options.limit));
}
