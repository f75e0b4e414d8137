import type { ActivityMap, ActivityRecord } from "../services/search/types.js";

/** Build a record with test defaults; `name` is required so keys stay unique. */
export function activity(
  name: string,
  overrides: Partial<Omit<ActivityRecord, "name">> = {}
): ActivityRecord {
  return {
    name,
    description: `${name} description`,
    schedule: "Mondays, 3:00 PM - 4:00 PM",
    category: "Academic",
    maxParticipants: 10,
    participants: [],
    ...overrides,
  };
}

export function recordMap(...records: ActivityRecord[]): ActivityMap {
  return new Map(records.map((r) => [r.name, r]));
}

/** `count` distinct placeholder emails. */
export function emails(count: number, prefix = "student"): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}@test.local`);
}
