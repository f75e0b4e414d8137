import { describe, expect, it } from "vitest";
import { filterActivities, hasOpenSpot } from "../services/search/stages/filter.stage.js";
import type { ActivityRecord, SearchCriteria } from "../services/search/types.js";
import { activity, emails, recordMap } from "./fixtures.js";

const records = recordMap(
  activity("Chess Club", {
    description: "Learn strategies and compete in chess tournaments",
    schedule: "Fridays, 3:30 PM - 5:00 PM",
    category: "Academic",
    maxParticipants: 12,
    participants: ["a@test.local", "b@test.local"],
  }),
  activity("Soccer Team", {
    description: "Join the school soccer team",
    schedule: "Tuesdays and Thursdays, 4:00 PM - 5:30 PM",
    category: "Sports",
    maxParticipants: 2,
    participants: emails(2),
  }),
  activity("Art Club", {
    description: "Painting and drawing",
    schedule: "Thursdays, 3:30 PM - 5:00 PM",
    category: "Arts",
    maxParticipants: 15,
  }),
  activity("Gym Class", {
    description: "Physical education and sports activities",
    schedule: "Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM",
    category: "Sports",
    maxParticipants: 30,
    participants: emails(5),
  })
);

function satisfies(record: ActivityRecord, criteria: SearchCriteria): boolean {
  const { query, category, available, day } = criteria;
  if (query !== undefined) {
    const q = query.toLowerCase();
    if (!record.name.toLowerCase().includes(q) && !record.description.toLowerCase().includes(q)) {
      return false;
    }
  }
  if (category !== undefined && record.category.toLowerCase() !== category.toLowerCase()) return false;
  if (available !== undefined && hasOpenSpot(record) !== available) return false;
  if (day !== undefined && !record.schedule.toLowerCase().includes(day.toLowerCase())) return false;
  return true;
}

describe("filterActivities", () => {
  it("returns every record in store order when no criteria are given", () => {
    const result = filterActivities(records, {});
    expect([...result.keys()]).toEqual(["Chess Club", "Soccer Team", "Art Club", "Gym Class"]);
    expect(result.get("Chess Club")).toBe(records.get("Chess Club"));
  });

  it("matches category exactly, ignoring case", () => {
    const chessAndSoccer = recordMap(
      activity("Chess Club", { category: "Academic", participants: ["a@test.local", "b@test.local"] }),
      activity("Soccer Team", { category: "Sports" })
    );
    const result = filterActivities(chessAndSoccer, { category: "Academic" });
    expect([...result.keys()]).toEqual(["Chess Club"]);

    expect([...filterActivities(chessAndSoccer, { category: "academic" }).keys()]).toEqual([
      "Chess Club",
    ]);
    expect(filterActivities(chessAndSoccer, { category: "Acad" }).size).toBe(0);
  });

  it("matches query against name or description, ignoring case", () => {
    expect([...filterActivities(records, { query: "CLUB" }).keys()]).toEqual([
      "Chess Club",
      "Art Club",
    ]);
    expect([...filterActivities(records, { query: "sports" }).keys()]).toEqual(["Gym Class"]);
  });

  it("matches day as a substring of the schedule", () => {
    expect([...filterActivities(records, { day: "friday" }).keys()]).toEqual([
      "Chess Club",
      "Gym Class",
    ]);
    expect([...filterActivities(records, { day: "Thursday" }).keys()]).toEqual([
      "Soccer Team",
      "Art Club",
    ]);
  });

  it("splits records on capacity for available=true and available=false", () => {
    expect([...filterActivities(records, { available: true }).keys()]).toEqual([
      "Chess Club",
      "Art Club",
      "Gym Class",
    ]);
    expect([...filterActivities(records, { available: false }).keys()]).toEqual(["Soccer Team"]);
  });

  it("drops a full activity and re-includes it once a spot opens", () => {
    const full = activity("Robotics", { maxParticipants: 3, participants: emails(3) });
    expect(filterActivities(recordMap(full), { available: true }).size).toBe(0);

    const oneLess = { ...full, participants: emails(2) };
    expect([...filterActivities(recordMap(oneLess), { available: true }).keys()]).toEqual([
      "Robotics",
    ]);
  });

  it("returns an empty map when nothing matches", () => {
    const result = filterActivities(records, { query: "underwater basket weaving" });
    expect(result.size).toBe(0);
  });

  it("combines criteria so every result satisfies each one on its own", () => {
    const cases: SearchCriteria[] = [
      { category: "sports", available: true },
      { query: "club", day: "thursday" },
      { query: "a", category: "Academic", day: "Fri" },
      { available: false, category: "Sports" },
      { query: "e", available: true, day: "days" },
    ];

    for (const criteria of cases) {
      const result = filterActivities(records, criteria);
      for (const [name, record] of result) {
        expect(records.get(name)).toBe(record);
        expect(satisfies(record, criteria)).toBe(true);
      }
      const expected = [...records.values()].filter((r) => satisfies(r, criteria)).map((r) => r.name);
      expect([...result.keys()]).toEqual(expected);
    }
  });

  it("requires all criteria to hold", () => {
    const result = filterActivities(records, { category: "Sports", day: "Friday" });
    expect([...result.keys()]).toEqual(["Gym Class"]);
  });
});
