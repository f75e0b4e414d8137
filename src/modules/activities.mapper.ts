import type {
  ActivityRecord,
  RankedActivity,
  SearchResult,
  Suggestion,
} from "../../services/search/types.js";
import type {
  ActivityPayload,
  ActivityPayloadMap,
  SearchResponse,
  SuggestionsResponse,
} from "./activities.types.js";

// ─── Row mapping ─────────────────────────────────────────────────────────────

export function toActivityPayload(r: ActivityRecord): ActivityPayload {
  return {
    description: r.description,
    schedule: r.schedule,
    max_participants: r.maxParticipants,
    participants: [...r.participants],
    category: r.category,
  };
}

/**
 * Build the name → payload object in the given order.
 * Note: JS objects list integer-like keys ("42") first, so an activity named
 * like a number would not keep its sorted position.
 */
export function toActivityPayloadMap(entries: Iterable<RankedActivity>): ActivityPayloadMap {
  const out: ActivityPayloadMap = {};
  for (const [name, record] of entries) {
    out[name] = toActivityPayload(record);
  }
  return out;
}

export function toSearchResponse(result: SearchResult): SearchResponse {
  return {
    total: result.total,
    query: result.query,
    filters: {
      category: result.filters.category,
      available: result.filters.available,
      day: result.filters.day,
      sort_by: result.filters.sortBy,
    },
    results: toActivityPayloadMap(result.results),
  };
}

export function toSuggestionsResponse(query: string, suggestions: Suggestion[]): SuggestionsResponse {
  return {
    query,
    suggestions: suggestions.map((s) => ({ text: s.text, type: s.kind })),
  };
}
