/**
 * Search Service — Table of contents
 *
 * Orchestrates the search pipeline over one store snapshot: plan → filter → sort.
 * Categories, filter options and suggestions read the same snapshot but skip filter and sort.
 */

import type { ActivityStore } from "../../database/index.js";
import { listCategories } from "../catalog/categories.js";
import { listFilterOptions, type FilterOptions } from "../catalog/filterOptions.js";
import { suggest, type SuggestOptions } from "../suggestions/suggestion.service.js";
import { buildSearchPlan } from "./search.plan.js";
import type { SearchInput, SearchPlan, SearchResult, Suggestion } from "./types.js";

// ─── Stages (table of contents) ─────────────────────────────────────────────

import { filterActivities } from "./stages/filter.stage.js";
import { sortActivities } from "./stages/sort.stage.js";

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Run the search pipeline and return the ordered result with echoed filters.
 * Throws SearchPlanValidationError when a criterion has the wrong type.
 */
export function searchActivities(store: ActivityStore, input: SearchInput): SearchResult {
  // 1. Build plan (type-checks criteria, resolves sort key)
  const plan = buildSearchPlan(input);

  // 2. Snapshot — every stage reads the same copy
  const records = store.snapshot();

  // 3. Filter — conjunction of the present criteria
  const matches = filterActivities(records, plan.criteria);

  // 4. Sort — by plan.sortBy with name as tie-break
  const results = sortActivities(matches, plan.sortBy);

  return {
    total: results.length,
    query: plan.input.query ?? null,
    filters: echoFilters(plan),
    results,
  };
}

/** Distinct categories currently present in the store. */
export function listActivityCategories(store: ActivityStore): string[] {
  return listCategories(store.snapshot());
}

/** Categories, schedules and sort keys a client can offer as filters. */
export function listActivityFilterOptions(store: ActivityStore): FilterOptions {
  return listFilterOptions(store.snapshot());
}

/** Autocomplete suggestions for a partial term against the whole store. */
export function suggestActivities(
  store: ActivityStore,
  term: string,
  options: SuggestOptions = {}
): Suggestion[] {
  return suggest(store.snapshot(), term, options);
}

// ─── Helpers ───────────────────────────────────────────────────────────────

function echoFilters(plan: SearchPlan): SearchResult["filters"] {
  return {
    category: plan.input.category ?? null,
    available: plan.input.available ?? null,
    day: plan.input.day ?? null,
    sortBy: plan.sortBy,
  };
}
