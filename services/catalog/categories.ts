import { compareText } from "../search/stages/sort.stage.js";
import type { ActivityMap } from "../search/types.js";

/** Distinct categories present in the records, ascending. Recomputed on every call. */
export function listCategories(records: ActivityMap): string[] {
  const categories = new Set<string>();
  for (const record of records.values()) {
    categories.add(record.category);
  }
  return [...categories].sort(compareText);
}
