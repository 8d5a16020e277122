import { nanoid } from "nanoid";
import { z } from "zod";
import {
  ACTIVITY_TYPES,
  SUPERVISION_TYPES,
  isSupervised,
  type ActivityType,
  type SessionRecord,
  type SupervisionType,
} from "../types.js";
import { computeDurationHours, isIsoDate, parseTimeOfDay } from "../time.js";

export class SessionValidationError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(issues.join("; "));
    this.name = "SessionValidationError";
    this.issues = issues;
  }
}

function matchVariant<T extends string>(
  variants: readonly T[],
  raw: string
): T | null {
  const wanted = raw.trim().toLowerCase();
  return variants.find((v) => v.toLowerCase() === wanted) ?? null;
}

/**
 * Normalise every "not supervised" spelling (null, empty, "none") to "None".
 * Returns null for unknown values.
 */
export function parseSupervisionType(raw: unknown): SupervisionType | null {
  if (raw === null || raw === undefined) return "None";
  if (typeof raw !== "string") return null;
  if (raw.trim() === "") return "None";
  return matchVariant(SUPERVISION_TYPES, raw);
}

export function parseActivityType(raw: unknown): ActivityType | null {
  if (typeof raw !== "string") return null;
  return matchVariant(ACTIVITY_TYPES, raw);
}

const DraftInput = z.object({
  date: z.string().refine(isIsoDate, "date must be YYYY-MM-DD"),
  startTime: z.string(),
  endTime: z.string(),
  activityType: z.unknown(),
  supervisionType: z.unknown(),
  supervisor: z.string().nullish(),
  energyRating: z.number().int().min(1).max(5).nullish(),
  notes: z.string().nullish(),
});

export type SessionDraftInput = z.input<typeof DraftInput>;

/**
 * Turn raw form input into a candidate record. Duration is derived here,
 * overnight sessions included; the core only ever reads it.
 */
export function buildSessionRecord(
  input: SessionDraftInput,
  newId: () => string = nanoid
): SessionRecord {
  const parsed = DraftInput.safeParse(input);
  if (!parsed.success) {
    throw new SessionValidationError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const d = parsed.data;
  const issues: string[] = [];

  const startTime = parseTimeOfDay(d.startTime);
  const endTime = parseTimeOfDay(d.endTime);
  if (!startTime) issues.push(`Unrecognised start time "${d.startTime}".`);
  if (!endTime) issues.push(`Unrecognised end time "${d.endTime}".`);

  const activityType = parseActivityType(d.activityType);
  if (!activityType) {
    issues.push(`Activity must be one of: ${ACTIVITY_TYPES.join(", ")}.`);
  }
  const supervisionType = parseSupervisionType(d.supervisionType);
  if (!supervisionType) {
    issues.push(`Supervision must be one of: ${SUPERVISION_TYPES.join(", ")}.`);
  }

  const supervisor = (d.supervisor ?? "").trim();
  if (supervisionType && isSupervised(supervisionType) && !supervisor) {
    issues.push("Supervisor name is required for supervised sessions.");
  }

  if (!startTime || !endTime || !activityType || !supervisionType) {
    throw new SessionValidationError(issues);
  }

  const durationHours = computeDurationHours(startTime, endTime);
  if (durationHours <= 0) {
    issues.push(`Duration must be positive. Calculated: ${durationHours}`);
  }
  if (issues.length > 0) throw new SessionValidationError(issues);

  return Object.freeze({
    id: newId(),
    date: d.date,
    startTime,
    endTime,
    durationHours,
    activityType,
    supervisionType,
    supervisor,
    energyRating: d.energyRating ?? null,
    notes: (d.notes ?? "").trim(),
  });
}
