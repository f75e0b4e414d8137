// ─── ActivityRecord ──────────────────────────────────────────────────────────
/** One extracurricular offering. `name` is the stable key; `participants` holds unique student emails, never more than maxParticipants. */
export interface ActivityRecord {
  name: string;
  description: string;
  schedule: string;
  category: string;
  maxParticipants: number;
  participants: string[];
}

/** Activity records keyed by name, in store iteration order. */
export type ActivityMap = ReadonlyMap<string, ActivityRecord>;

/** A sorted result entry: activity name paired with its record. */
export type RankedActivity = readonly [name: string, record: ActivityRecord];

// ─── SortKey ─────────────────────────────────────────────────────────────────

export const SortKey = {
  NAME: "name",
  PARTICIPANTS: "participants",
  AVAILABILITY: "availability",
} as const;

export type SortKey = (typeof SortKey)[keyof typeof SortKey];

export const DEFAULT_SORT_KEY: SortKey = SortKey.NAME;

// ─── SearchInput ─────────────────────────────────────────────────────────────
/** Caller-provided search request. Every field is optional; null and undefined both mean "not given". */
export interface SearchInput {
  query?: string | null;
  category?: string | null;
  available?: boolean | null;
  day?: string | null;
  sortBy?: string | null;
}

// ─── SearchCriteria ──────────────────────────────────────────────────────────
/** Normalized filter criteria. An absent field applies no filter on that axis. */
export interface SearchCriteria {
  query?: string;
  category?: string;
  available?: boolean;
  day?: string;
}

// ─── SearchPlan ──────────────────────────────────────────────────────────────
/**
 * Resolved execution plan from SearchInput. Immutable; used by the filter and sort stages.
 * - criteria: typed filters with empty strings dropped
 * - sortBy: resolved sort key (unknown keys fall back to name)
 */
export interface SearchPlan {
  input: SearchInput;
  criteria: SearchCriteria;
  sortBy: SortKey;
}

// ─── SearchResult ────────────────────────────────────────────────────────────
/** Search outcome: ordered results plus the echoed query and filters. */
export interface SearchResult {
  total: number;
  query: string | null;
  filters: {
    category: string | null;
    available: boolean | null;
    day: string | null;
    sortBy: SortKey;
  };
  results: RankedActivity[];
}

// ─── Suggestion ──────────────────────────────────────────────────────────────

export type SuggestionKind = "activity" | "keyword";

/** Autocomplete entry: a full activity name or a keyword drawn from names and descriptions. */
export interface Suggestion {
  text: string;
  kind: SuggestionKind;
}
