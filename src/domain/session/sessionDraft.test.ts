import { describe, it, expect } from "vitest";
import {
  buildSessionRecord,
  parseActivityType,
  parseSupervisionType,
  SessionValidationError,
  type SessionDraftInput,
} from "./sessionDraft.js";

const base: SessionDraftInput = {
  date: "2024-03-01",
  startTime: "09:00",
  endTime: "10:30",
  activityType: "Restricted",
  supervisionType: "Individual",
  supervisor: "Dr. Lee",
};

function issuesOf(input: SessionDraftInput): string[] {
  try {
    buildSessionRecord(input, () => "id-x");
  } catch (err) {
    if (err instanceof SessionValidationError) return err.issues;
    throw err;
  }
  throw new Error("expected a SessionValidationError");
}

describe("parseSupervisionType", () => {
  it("normalises every not-supervised spelling to None", () => {
    for (const raw of [null, undefined, "", "  ", "None", "none", "NONE"]) {
      expect(parseSupervisionType(raw)).toBe("None");
    }
  });

  it("matches variants case-insensitively and rejects the rest", () => {
    expect(parseSupervisionType("individual")).toBe("Individual");
    expect(parseSupervisionType(" Group ")).toBe("Group");
    expect(parseSupervisionType("peer")).toBeNull();
    expect(parseSupervisionType(3)).toBeNull();
  });
});

describe("parseActivityType", () => {
  it("accepts the two activity kinds", () => {
    expect(parseActivityType("restricted")).toBe("Restricted");
    expect(parseActivityType("Unrestricted")).toBe("Unrestricted");
    expect(parseActivityType("")).toBeNull();
    expect(parseActivityType(undefined)).toBeNull();
  });
});

describe("buildSessionRecord", () => {
  it("builds a frozen record with a derived duration", () => {
    const rec = buildSessionRecord({ ...base, notes: "  parent training " }, () => "id-1");
    expect(rec).toEqual({
      id: "id-1",
      date: "2024-03-01",
      startTime: { hour: 9, minute: 0, second: 0 },
      endTime: { hour: 10, minute: 30, second: 0 },
      durationHours: 1.5,
      activityType: "Restricted",
      supervisionType: "Individual",
      supervisor: "Dr. Lee",
      energyRating: null,
      notes: "parent training",
    });
    expect(Object.isFrozen(rec)).toBe(true);
  });

  it("computes overnight sessions into the next day", () => {
    const rec = buildSessionRecord(
      { ...base, startTime: "22:00", endTime: "01:00:00" },
      () => "id-2"
    );
    expect(rec.durationHours).toBe(3);
  });

  it("generates an id when none is supplied", () => {
    const rec = buildSessionRecord(base);
    expect(rec.id).toMatch(/^[A-Za-z0-9_-]{21}$/);
  });

  it("normalises an empty supervision type to None without a supervisor", () => {
    const rec = buildSessionRecord(
      { ...base, supervisionType: "", supervisor: null },
      () => "id-3"
    );
    expect(rec.supervisionType).toBe("None");
    expect(rec.supervisor).toBe("");
  });

  it("requires a supervisor for supervised sessions", () => {
    expect(issuesOf({ ...base, supervisor: "  " })).toEqual([
      "Supervisor name is required for supervised sessions.",
    ]);
  });

  it("rejects a zero-length session", () => {
    expect(issuesOf({ ...base, endTime: "09:00" })).toEqual([
      "Duration must be positive. Calculated: 0",
    ]);
  });

  it("collects unparsable fields together", () => {
    expect(
      issuesOf({
        ...base,
        startTime: "9am",
        activityType: "billing",
        supervisionType: "peer",
      })
    ).toEqual([
      'Unrecognised start time "9am".',
      "Activity must be one of: Restricted, Unrestricted.",
      "Supervision must be one of: None, Individual, Group.",
    ]);
  });

  it("rejects an impossible date and an out-of-range energy rating", () => {
    expect(issuesOf({ ...base, date: "2024-02-30" })).toEqual([
      "date: date must be YYYY-MM-DD",
    ]);
    expect(issuesOf({ ...base, energyRating: 6 })).toHaveLength(1);
  });

  it("keeps a valid energy rating", () => {
    expect(buildSessionRecord({ ...base, energyRating: 4 }, () => "id-4").energyRating).toBe(4);
  });
});
