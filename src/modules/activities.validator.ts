import { z } from "zod";

const TRUE_VALUES = ["true", "1", "yes", "on"];
const FALSE_VALUES = ["false", "0", "no", "off"];

/**
 * Validates the optional availability flag from a query string.
 * - Absent: valid (no availability filter).
 * - Booleans pass through; strings true/false/1/0/yes/no/on/off map to booleans, ignoring case.
 * - Anything else (including the empty string) is rejected rather than coerced.
 */
const availableSchema = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((v, ctx) => {
    if (v === undefined || typeof v === "boolean") return v;
    const s = v.trim().toLowerCase();
    if (TRUE_VALUES.includes(s)) return true;
    if (FALSE_VALUES.includes(s)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `available must be one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(", ")}`,
    });
    return z.NEVER;
  });

export const SearchQuerySchema = z.object({
  q: z.string().optional(),
  category: z.string().optional(),
  available: availableSchema,
  day: z.string().optional(),
  // Unknown keys are resolved to "name" by the search plan, not rejected here.
  sort_by: z.string().optional(),
});

export const SuggestionsQuerySchema = z.object({
  q: z.string().optional().default(""),
});

export const ActivityParamsSchema = z.object({
  activityName: z.string().min(1),
});

export const EmailQuerySchema = z.object({
  email: z.string().trim().email(),
});

/** Join zod issues into one line: "path: message; path: message". */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.length ? e.path.join(".") : "value";
      return `${path}: ${e.message}`;
    })
    .join("; ");
}
