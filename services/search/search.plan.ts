import { DEFAULT_SORT_KEY, SortKey } from "./types.js";
import type { SearchCriteria, SearchInput, SearchPlan } from "./types.js";

// ─── Domain validation errors ───────────────────────────────────────────────

export const SearchPlanErrorCode = {
  INVALID_QUERY: "INVALID_QUERY",
  INVALID_CATEGORY: "INVALID_CATEGORY",
  INVALID_AVAILABLE: "INVALID_AVAILABLE",
  INVALID_DAY: "INVALID_DAY",
} as const;

export type SearchPlanErrorCode =
  (typeof SearchPlanErrorCode)[keyof typeof SearchPlanErrorCode];

export class SearchPlanValidationError extends Error {
  readonly code: SearchPlanErrorCode;

  constructor(code: SearchPlanErrorCode, message: string) {
    super(message);
    this.name = "SearchPlanValidationError";
    this.code = code;
    Object.setPrototypeOf(this, SearchPlanValidationError.prototype);
  }
}

// ─── Helpers ───────────────────────────────────────────────────────────────

const SORT_KEYS: readonly string[] = Object.values(SortKey);

function isSortKey(value: unknown): value is SortKey {
  return typeof value === "string" && SORT_KEYS.includes(value);
}

/** Read an optional text criterion; empty string counts as absent. Throws on non-string values. */
function parseText(
  value: unknown,
  field: "query" | "category" | "day",
  code: SearchPlanErrorCode
): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new SearchPlanValidationError(code, `${field} must be a string when provided`);
  }
  return value === "" ? undefined : value;
}

/** Read the optional availability flag. Only real booleans are accepted; "true" strings are the validator's job. */
function parseAvailable(value: unknown): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new SearchPlanValidationError(
      SearchPlanErrorCode.INVALID_AVAILABLE,
      `available must be a boolean when provided, got ${typeof value}`
    );
  }
  return value;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Map a requested sort key to a SortKey; absent or unknown keys resolve to name. */
export function resolveSortKey(value: unknown): SortKey {
  return isSortKey(value) ? value : DEFAULT_SORT_KEY;
}

/** Build an immutable SearchPlan from SearchInput. */
export function buildSearchPlan(input: SearchInput): SearchPlan {
  const criteria: SearchCriteria = {};

  const query = parseText(input.query, "query", SearchPlanErrorCode.INVALID_QUERY);
  if (query !== undefined) criteria.query = query;

  const category = parseText(input.category, "category", SearchPlanErrorCode.INVALID_CATEGORY);
  if (category !== undefined) criteria.category = category;

  const available = parseAvailable(input.available);
  if (available !== undefined) criteria.available = available;

  const day = parseText(input.day, "day", SearchPlanErrorCode.INVALID_DAY);
  if (day !== undefined) criteria.day = day;

  const plan: SearchPlan = {
    input,
    criteria: Object.freeze(criteria),
    sortBy: resolveSortKey(input.sortBy),
  };

  return Object.freeze(plan);
}
