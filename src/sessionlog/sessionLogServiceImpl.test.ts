import { describe, it, expect, beforeEach } from "vitest";
import { SessionLogServiceImpl } from "./sessionLogServiceImpl.js";
import { InMemorySessionRepository } from "../test-helpers/inMemorySessionRepository.js";
import { ComplianceEngine } from "../domain/compliance/complianceEngine.js";
import { BUILT_IN_RULESET } from "../domain/policy.js";
import type { RuleSetResolution } from "../domain/rules/types.js";
import type { SessionDraftInput } from "../domain/session/sessionDraft.js";

const resolution: RuleSetResolution = {
  requestedVersion: "2022",
  version: "2022",
  origin: "requested",
  ruleSet: BUILT_IN_RULESET,
};

function draft(overrides: Partial<SessionDraftInput> = {}): SessionDraftInput {
  return {
    date: "2024-03-01",
    startTime: "09:00",
    endTime: "10:00",
    activityType: "Restricted",
    supervisionType: "None",
    ...overrides,
  };
}

describe("SessionLogServiceImpl", () => {
  let repo: InMemorySessionRepository;
  let service: SessionLogServiceImpl;
  let seq: number;

  beforeEach(() => {
    repo = new InMemorySessionRepository();
    seq = 0;
    service = new SessionLogServiceImpl(
      repo,
      resolution,
      new ComplianceEngine(BUILT_IN_RULESET, "Standard"),
      () => `s${++seq}`
    );
  });

  it("persists a safe session and returns the refreshed month", async () => {
    const outcome = await service.logSession(7, draft());
    expect(outcome.status).toBe("persisted");
    if (outcome.status !== "persisted") return;

    expect(outcome.record.id).toBe("s1");
    expect(outcome.report).toMatchObject({ year: 2024, month: 3, sessions: 1 });
    expect(outcome.report.stats.totalHours).toBe(1);
    expect(repo.rows).toHaveLength(1);
    expect(repo.rows[0]).toMatchObject({
      id: "s1",
      user_id: 7,
      start_time: "09:00:00",
      end_time: "10:00:00",
      supervision_type: "None",
    });
  });

  it("rejects an overlapping session and stores nothing", async () => {
    await service.logSession(7, draft());
    const outcome = await service.logSession(
      7,
      draft({ startTime: "09:30", endTime: "10:30" })
    );
    expect(outcome).toEqual({
      status: "rejected",
      errors: [
        "OVERLAP DETECTED: Clashes with entry on 2024-03-01 (09:00:00 - 10:00:00).",
      ],
    });
    expect(repo.rows).toHaveLength(1);
  });

  it("accepts an adjacent session", async () => {
    await service.logSession(7, draft());
    const outcome = await service.logSession(
      7,
      draft({ startTime: "10:00", endTime: "11:00" })
    );
    expect(outcome.status).toBe("persisted");
    expect(repo.rows).toHaveLength(2);
  });

  it("only audits against the same trainee's history", async () => {
    await service.logSession(7, draft());
    const outcome = await service.logSession(8, draft());
    expect(outcome.status).toBe("persisted");
  });

  it("turns validation failures into a rejected outcome", async () => {
    const outcome = await service.logSession(
      7,
      draft({ supervisionType: "Group", supervisor: "" })
    );
    expect(outcome).toEqual({
      status: "rejected",
      errors: ["Supervisor name is required for supervised sessions."],
    });
    expect(repo.rows).toHaveLength(0);
  });

  it("rejects an implausibly long session", async () => {
    const outcome = await service.logSession(
      7,
      draft({ startTime: "08:00", endTime: "21:00" })
    );
    expect(outcome).toEqual({
      status: "rejected",
      errors: [
        "AUDIT RISK: Session duration (13.00h) exceeds daily safety limit (12.0h).",
      ],
    });
  });

  it("lets only one of two concurrent clashing submissions through", async () => {
    const [a, b] = await Promise.all([
      service.logSession(7, draft({ startTime: "09:00", endTime: "10:00" })),
      service.logSession(7, draft({ startTime: "09:30", endTime: "10:30" })),
    ]);
    expect([a.status, b.status]).toEqual(["persisted", "rejected"]);
    expect(repo.rows).toHaveLength(1);
  });

  it("reports a month, optionally for one supervisor", async () => {
    repo.seed({ id: "a", user_id: 7, date: "2024-03-04", duration_hours: 10 });
    repo.seed({
      id: "b",
      user_id: 7,
      date: "2024-03-05",
      duration_hours: 2,
      supervision_type: "Individual",
      supervisor: "Dr. Lee",
    });
    repo.seed({
      id: "c",
      user_id: 7,
      date: "2024-03-06",
      duration_hours: 3,
      supervision_type: "Group",
      supervisor: "Dr. Kim",
    });
    repo.seed({ id: "d", user_id: 7, date: "2024-04-01", duration_hours: 50 });

    const all = await service.monthReport(7, { year: 2024, month: 3 });
    expect(all.sessions).toBe(3);
    expect(all.stats.totalHours).toBe(15);
    expect(all.stats.supervisedHours).toBe(5);

    const lee = await service.monthReport(7, {
      year: 2024,
      month: 3,
      supervisor: "dr. lee",
    });
    expect(lee).toMatchObject({ sessions: 1, supervisor: "dr. lee" });
    expect(lee.stats.totalHours).toBe(2);
  });

  it("normalises stored empty supervision values as unsupervised", async () => {
    repo.seed({ id: "a", user_id: 7, date: "2024-03-04", supervision_type: null });
    repo.seed({ id: "b", user_id: 7, date: "2024-03-05", supervision_type: "" });
    const report = await service.monthReport(7, { year: 2024, month: 3 });
    expect(report.stats.supervisedHours).toBe(0);
    expect(report.stats.totalHours).toBe(2);
  });

  it("fails loudly on an unknown stored supervision value", async () => {
    repo.seed({ id: "x", user_id: 7, date: "2024-03-04", supervision_type: "Peer" });
    await expect(service.monthReport(7, { year: 2024, month: 3 })).rejects.toThrow(
      'Session x has unknown supervision type "Peer"'
    );
  });

  it("deletes only the trainee's own sessions", async () => {
    await service.logSession(7, draft());
    expect(await service.deleteSession(8, "s1")).toBe(false);
    expect(await service.deleteSession(7, "s1")).toBe(true);
    expect(await service.sessionsOn(7, "2024-03-01")).toEqual([]);
  });

  it("lets a corrected session be re-logged after deletion", async () => {
    await service.logSession(7, draft());
    await service.deleteSession(7, "s1");
    const outcome = await service.logSession(
      7,
      draft({ startTime: "09:30", endTime: "10:30" })
    );
    expect(outcome.status).toBe("persisted");
  });
});
