import { SortKey } from "../types.js";
import type { ActivityMap, ActivityRecord, RankedActivity } from "../types.js";

type Comparator = (a: RankedActivity, b: RankedActivity) => number;

/** Case-sensitive code-unit order, independent of locale. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function remainingCapacity(record: ActivityRecord): number {
  return record.maxParticipants - record.participants.length;
}

const byName: Comparator = ([a], [b]) => compareText(a, b);

/** Descending on the numeric key, then name ascending. Names are unique, so the order is total. */
function descendingThenName(key: (record: ActivityRecord) => number): Comparator {
  return (a, b) => key(b[1]) - key(a[1]) || byName(a, b);
}

const COMPARATORS: Record<SortKey, Comparator> = {
  [SortKey.NAME]: byName,
  [SortKey.PARTICIPANTS]: descendingThenName((r) => r.participants.length),
  [SortKey.AVAILABILITY]: descendingThenName(remainingCapacity),
};

/** Sort stage: order records by the given key. */
export function sortActivities(records: ActivityMap, sortKey: SortKey): RankedActivity[] {
  return [...records.entries()].sort(COMPARATORS[sortKey]);
}
