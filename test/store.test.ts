import { describe, expect, it } from "vitest";
import { ActivityStore, createActivityStore } from "../database/index.js";
import { SEED_ACTIVITIES } from "../database/seed.js";
import { activity } from "./fixtures.js";

describe("ActivityStore", () => {
  it("loads the seed set in order", () => {
    const store = createActivityStore();
    expect([...store.snapshot().keys()]).toEqual(SEED_ACTIVITIES.map((a) => a.name));
    expect(store.get("Chess Club")?.name).toBe("Chess Club");
    expect(store.get("chess club")).toBeUndefined();
  });

  it("does not share participant arrays with the seed", () => {
    const store = createActivityStore();
    store.addParticipant("Robotics Workshop", "new@test.local");
    expect(SEED_ACTIVITIES.find((a) => a.name === "Robotics Workshop")?.participants).toEqual([]);
  });

  it("hands out copies from snapshot and get", () => {
    const store = new ActivityStore([activity("Chess Club", { participants: ["a@test.local"] })]);

    store.snapshot().get("Chess Club")?.participants.push("b@test.local");
    store.get("Chess Club")?.participants.push("c@test.local");

    expect(store.get("Chess Club")?.participants).toEqual(["a@test.local"]);
    expect(store.get("Nope")).toBeUndefined();
  });

  it("adds and removes participants", () => {
    const store = new ActivityStore([activity("Chess Club", { participants: ["a@test.local"] })]);

    store.addParticipant("Chess Club", "b@test.local");
    expect(store.get("Chess Club")?.participants).toEqual(["a@test.local", "b@test.local"]);

    store.removeParticipant("Chess Club", "a@test.local");
    expect(store.get("Chess Club")?.participants).toEqual(["b@test.local"]);

    store.removeParticipant("Chess Club", "missing@test.local");
    expect(store.get("Chess Club")?.participants).toEqual(["b@test.local"]);
  });

  it("throws when mutating an unknown activity", () => {
    const store = new ActivityStore([]);
    expect(() => store.addParticipant("Ghost Club", "a@test.local")).toThrowError(
      'Unknown activity: "Ghost Club"'
    );
  });

  it("rejects duplicate names in the seed", () => {
    expect(() => new ActivityStore([activity("Chess Club"), activity("Chess Club")])).toThrowError(
      'Duplicate activity name in seed: "Chess Club"'
    );
  });

  it("rejects seed records that break capacity or uniqueness", () => {
    expect(() => new ActivityStore([activity("Zero", { maxParticipants: 0 })])).toThrowError(
      'maxParticipants for "Zero" must be a positive integer'
    );
    expect(
      () => new ActivityStore([activity("Twice", { participants: ["a@test.local", "a@test.local"] })])
    ).toThrowError('Duplicate participant in "Twice"');
    expect(
      () =>
        new ActivityStore([
          activity("Crowded", { maxParticipants: 1, participants: ["a@test.local", "b@test.local"] }),
        ])
    ).toThrowError('"Crowded" has more participants than maxParticipants');
  });
});
