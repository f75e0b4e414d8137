import type { SortKey, SuggestionKind } from "../../services/search/types.js";

export interface ActivityPayload {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
  category: string;
}

/** name → payload; key order is the response order. */
export type ActivityPayloadMap = Record<string, ActivityPayload>;

export interface SearchResponse {
  total: number;
  query: string | null;
  filters: {
    category: string | null;
    available: boolean | null;
    day: string | null;
    sort_by: SortKey;
  };
  results: ActivityPayloadMap;
}

export interface CategoriesResponse {
  categories: string[];
}

export interface FilterOptionsResponse {
  categories: string[];
  schedules: string[];
  sort_options: SortKey[];
}

export interface SuggestionsResponse {
  query: string;
  suggestions: { text: string; type: SuggestionKind }[];
}

export interface MessageResponse {
  message: string;
}

export interface ControllerError {
  error: string;
  status: 400 | 404;
}
