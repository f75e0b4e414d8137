import type { FastifyBaseLogger } from "fastify";
import type { ActivityStore } from "../../database/index.js";
import { SearchPlanValidationError, resolveSortKey } from "../../services/search/search.plan.js";
import {
  listActivityCategories,
  listActivityFilterOptions,
  searchActivities,
  suggestActivities,
} from "../../services/search/search.service.js";
import { SignupError, signUp, unregister } from "../../services/signup/signup.service.js";
import {
  toActivityPayloadMap,
  toSearchResponse,
  toSuggestionsResponse,
} from "./activities.mapper.js";
import type {
  ActivityPayloadMap,
  CategoriesResponse,
  ControllerError,
  FilterOptionsResponse,
  MessageResponse,
  SearchResponse,
  SuggestionsResponse,
} from "./activities.types.js";
import {
  ActivityParamsSchema,
  EmailQuerySchema,
  SearchQuerySchema,
  SuggestionsQuerySchema,
  formatIssues,
} from "./activities.validator.js";

function badRequest(message: string): ControllerError {
  return { error: `Invalid query parameters: ${message}`, status: 400 };
}

export function listActivities(store: ActivityStore): ActivityPayloadMap {
  return toActivityPayloadMap(store.snapshot());
}

export function search(
  store: ActivityStore,
  queryParams: unknown,
  log: FastifyBaseLogger
): SearchResponse | ControllerError {
  const query = SearchQuerySchema.safeParse(queryParams);
  if (!query.success) {
    return badRequest(formatIssues(query.error));
  }

  const { q, category, available, day, sort_by } = query.data;
  const input = { query: q, category, available, day, sortBy: sort_by };

  if (sort_by !== undefined && resolveSortKey(sort_by) !== sort_by) {
    log.debug({ sortBy: sort_by }, "unrecognized sort key, falling back to name");
  }

  const t0 = performance.now();
  try {
    const result = searchActivities(store, input);
    log.debug({ total: result.total, ms: Math.round(performance.now() - t0) }, "activity search");
    return toSearchResponse(result);
  } catch (err) {
    if (err instanceof SearchPlanValidationError) {
      return badRequest(`${err.code}: ${err.message}`);
    }
    throw err;
  }
}

export function categories(store: ActivityStore): CategoriesResponse {
  return { categories: listActivityCategories(store) };
}

export function filterOptions(store: ActivityStore): FilterOptionsResponse {
  const { categories, schedules, sortOptions } = listActivityFilterOptions(store);
  return { categories, schedules, sort_options: sortOptions };
}

export function suggestions(
  store: ActivityStore,
  queryParams: unknown,
  limit: number,
  log: FastifyBaseLogger
): SuggestionsResponse | ControllerError {
  const query = SuggestionsQuerySchema.safeParse(queryParams);
  if (!query.success) {
    return badRequest(formatIssues(query.error));
  }

  const t0 = performance.now();
  const found = suggestActivities(store, query.data.q, { limit });
  log.debug({ count: found.length, ms: Math.round(performance.now() - t0) }, "activity suggestions");
  return toSuggestionsResponse(query.data.q, found);
}

type SignupAction = typeof signUp;

function runSignupAction(
  action: SignupAction,
  store: ActivityStore,
  params: unknown,
  queryParams: unknown
): MessageResponse | ControllerError {
  const activity = ActivityParamsSchema.safeParse(params);
  if (!activity.success) {
    return badRequest(formatIssues(activity.error));
  }
  const email = EmailQuerySchema.safeParse(queryParams);
  if (!email.success) {
    return badRequest(formatIssues(email.error));
  }

  try {
    return action(store, activity.data.activityName, email.data.email);
  } catch (err) {
    if (err instanceof SignupError) {
      return { error: err.message, status: err.status };
    }
    throw err;
  }
}

export function signup(
  store: ActivityStore,
  params: unknown,
  queryParams: unknown
): MessageResponse | ControllerError {
  return runSignupAction(signUp, store, params, queryParams);
}

export function unregisterStudent(
  store: ActivityStore,
  params: unknown,
  queryParams: unknown
): MessageResponse | ControllerError {
  return runSignupAction(unregister, store, params, queryParams);
}
