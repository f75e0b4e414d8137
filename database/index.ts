/**
 * In-memory activity store.
 * Records are keyed by activity name and kept in seed order; only participant lists change after startup.
 */

import type { ActivityRecord } from "../services/search/types.js";
import { SEED_ACTIVITIES } from "./seed.js";

function copyRecord(record: ActivityRecord): ActivityRecord {
  return { ...record, participants: [...record.participants] };
}

/** Seed records must already satisfy the capacity and uniqueness invariants. */
function assertValidRecord(record: ActivityRecord): void {
  if (!Number.isInteger(record.maxParticipants) || record.maxParticipants < 1) {
    throw new Error(`maxParticipants for "${record.name}" must be a positive integer`);
  }
  if (new Set(record.participants).size !== record.participants.length) {
    throw new Error(`Duplicate participant in "${record.name}"`);
  }
  if (record.participants.length > record.maxParticipants) {
    throw new Error(`"${record.name}" has more participants than maxParticipants`);
  }
}

// ─── Store ──────────────────────────────────────────────────────────────────

export class ActivityStore {
  private readonly activities = new Map<string, ActivityRecord>();

  constructor(seed: Iterable<ActivityRecord>) {
    for (const record of seed) {
      if (this.activities.has(record.name)) {
        throw new Error(`Duplicate activity name in seed: "${record.name}"`);
      }
      assertValidRecord(record);
      this.activities.set(record.name, copyRecord(record));
    }
  }

  /**
   * Copy of every record, in store order. Queries read from a snapshot so that a
   * later signup cannot change a result while it is being built.
   */
  snapshot(): Map<string, ActivityRecord> {
    const copy = new Map<string, ActivityRecord>();
    for (const [name, record] of this.activities) {
      copy.set(name, copyRecord(record));
    }
    return copy;
  }

  /** Copy of one record, or undefined when no activity has that name. */
  get(name: string): ActivityRecord | undefined {
    const record = this.activities.get(name);
    return record ? copyRecord(record) : undefined;
  }

  /** Append an email to the activity's participants. Callers check capacity and duplicates first. */
  addParticipant(name: string, email: string): void {
    this.requireRecord(name).participants.push(email);
  }

  /** Remove an email from the activity's participants; no-op when it is not there. */
  removeParticipant(name: string, email: string): void {
    const record = this.requireRecord(name);
    record.participants = record.participants.filter((p) => p !== email);
  }

  private requireRecord(name: string): ActivityRecord {
    const record = this.activities.get(name);
    if (!record) {
      throw new Error(`Unknown activity: "${name}"`);
    }
    return record;
  }
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Create a store holding the given records (the built-in seed set by default). */
export function createActivityStore(
  seed: Iterable<ActivityRecord> = SEED_ACTIVITIES
): ActivityStore {
  return new ActivityStore(seed);
}
