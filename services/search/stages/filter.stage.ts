import type { ActivityMap, ActivityRecord, SearchCriteria } from "../types.js";

type ActivityPredicate = (record: ActivityRecord) => boolean;

function includesIgnoringCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

/** True while the activity still has at least one open spot. */
export function hasOpenSpot(record: ActivityRecord): boolean {
  return record.participants.length < record.maxParticipants;
}

/** One predicate per present criterion; an empty list matches everything. */
function buildPredicates(criteria: SearchCriteria): ActivityPredicate[] {
  const predicates: ActivityPredicate[] = [];

  const { query, category, available, day } = criteria;

  if (query !== undefined) {
    predicates.push(
      (r) => includesIgnoringCase(r.name, query) || includesIgnoringCase(r.description, query)
    );
  }

  if (category !== undefined) {
    const wanted = category.toLowerCase();
    predicates.push((r) => r.category.toLowerCase() === wanted);
  }

  if (available !== undefined) {
    predicates.push((r) => hasOpenSpot(r) === available);
  }

  // Schedules are free text, so a day is matched as a substring ("Friday" hits "Mondays, Fridays").
  if (day !== undefined) {
    predicates.push((r) => includesIgnoringCase(r.schedule, day));
  }

  return predicates;
}

/** Filter stage: keep records matching every criterion, preserving store iteration order. */
export function filterActivities(
  records: ActivityMap,
  criteria: SearchCriteria
): Map<string, ActivityRecord> {
  const predicates = buildPredicates(criteria);
  const matches = new Map<string, ActivityRecord>();

  for (const [name, record] of records) {
    if (predicates.every((test) => test(record))) {
      matches.set(name, record);
    }
  }

  return matches;
}
