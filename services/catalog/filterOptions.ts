import { compareText } from "../search/stages/sort.stage.js";
import { SortKey, type ActivityMap } from "../search/types.js";
import { listCategories } from "./categories.js";

export interface FilterOptions {
  categories: string[];
  schedules: string[];
  sortOptions: SortKey[];
}

/** Values a client can offer as filters: distinct categories and schedules (ascending) plus every sort key. */
export function listFilterOptions(records: ActivityMap): FilterOptions {
  const schedules = new Set<string>();
  for (const record of records.values()) {
    schedules.add(record.schedule);
  }

  return {
    categories: listCategories(records),
    schedules: [...schedules].sort(compareText),
    sortOptions: Object.values(SortKey),
  };
}
