import type { ActivityStore } from "../../database/index.js";

// ─── Domain errors ──────────────────────────────────────────────────────────

export const SignupErrorCode = {
  ACTIVITY_NOT_FOUND: "ACTIVITY_NOT_FOUND",
  ALREADY_SIGNED_UP: "ALREADY_SIGNED_UP",
  NOT_SIGNED_UP: "NOT_SIGNED_UP",
  ACTIVITY_FULL: "ACTIVITY_FULL",
} as const;

export type SignupErrorCode = (typeof SignupErrorCode)[keyof typeof SignupErrorCode];

const STATUS_BY_CODE: Record<SignupErrorCode, 400 | 404> = {
  ACTIVITY_NOT_FOUND: 404,
  ALREADY_SIGNED_UP: 400,
  NOT_SIGNED_UP: 400,
  ACTIVITY_FULL: 400,
};

export class SignupError extends Error {
  readonly code: SignupErrorCode;
  readonly status: 400 | 404;

  constructor(code: SignupErrorCode, message: string) {
    super(message);
    this.name = "SignupError";
    this.code = code;
    this.status = STATUS_BY_CODE[code];
    Object.setPrototypeOf(this, SignupError.prototype);
  }
}

export interface SignupOutcome {
  message: string;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Add a student to an activity. Rejects unknown activities, duplicate signups and full activities. */
export function signUp(store: ActivityStore, activityName: string, email: string): SignupOutcome {
  const activity = store.get(activityName);
  if (!activity) {
    throw new SignupError(SignupErrorCode.ACTIVITY_NOT_FOUND, "Activity not found");
  }
  if (activity.participants.includes(email)) {
    throw new SignupError(SignupErrorCode.ALREADY_SIGNED_UP, "Student is already signed up");
  }
  if (activity.participants.length >= activity.maxParticipants) {
    throw new SignupError(SignupErrorCode.ACTIVITY_FULL, "Activity is full");
  }

  store.addParticipant(activityName, email);
  return { message: `Signed up ${email} for ${activityName}` };
}

/** Remove a student from an activity they are signed up for. */
export function unregister(store: ActivityStore, activityName: string, email: string): SignupOutcome {
  const activity = store.get(activityName);
  if (!activity) {
    throw new SignupError(SignupErrorCode.ACTIVITY_NOT_FOUND, "Activity not found");
  }
  if (!activity.participants.includes(email)) {
    throw new SignupError(
      SignupErrorCode.NOT_SIGNED_UP,
      "Student is not signed up for this activity"
    );
  }

  store.removeParticipant(activityName, email);
  return { message: `Unregistered ${email} from ${activityName}` };
}
