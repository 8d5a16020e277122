import { describe, it, expect, vi } from "vitest";
import { sendMonthlySummaries } from "./scheduler.js";
import { InMemorySessionRepository } from "../test-helpers/inMemorySessionRepository.js";
import { SessionLogServiceImpl } from "../sessionlog/sessionLogServiceImpl.js";
import { ComplianceEngine } from "../domain/compliance/complianceEngine.js";
import { BUILT_IN_RULESET } from "../domain/policy.js";
import type { BotService } from "../services/bot.service.js";

describe("sendMonthlySummaries", () => {
  it("sends last month's stats to each trainee who logged time", async () => {
    const repo = new InMemorySessionRepository();
    repo.tgIds.set(1, 1001);
    repo.tgIds.set(2, 1002);
    repo.seed({ id: "a", user_id: 1, date: "2024-02-10", duration_hours: 21 });
    repo.seed({ id: "b", user_id: 1, date: "2024-02-11", duration_hours: 2, supervision_type: "Individual", supervisor: "Dr. Lee" });
    repo.seed({ id: "c", user_id: 2, date: "2024-03-01", duration_hours: 4 });

    const sendMessage = vi.fn<BotService["sendMessage"]>().mockResolvedValue({
      message_id: 1,
      date: 0,
      chat: { id: 1001, type: "private" },
    });
    const botService: BotService = { sendMessage, onText: vi.fn() };
    const sessionLogService = new SessionLogServiceImpl(
      repo,
      {
        requestedVersion: "2022",
        version: "2022",
        origin: "requested",
        ruleSet: BUILT_IN_RULESET,
      },
      new ComplianceEngine(BUILT_IN_RULESET, "Standard")
    );

    const sent = await sendMonthlySummaries(
      { botService, sessionLogService, sessionRepository: repo },
      new Date(2024, 2, 1, 9, 0)
    );

    expect(sent).toBe(1);
    expect(sendMessage).toHaveBeenCalledTimes(1);
    const [chatId, text, options] = sendMessage.mock.calls[0];
    expect(chatId).toBe(1001);
    expect(options).toEqual({ parse_mode: "MarkdownV2" });
    expect(text.split("\n").slice(0, 4)).toEqual([
      "📅 *Monthly summary*",
      "",
      "*Fieldwork 2024\\-02*",
      "Sessions: *2*",
    ]);
  });

  it("keeps going when one trainee's month cannot be reported", async () => {
    const repo = new InMemorySessionRepository();
    repo.tgIds.set(1, 1001);
    repo.tgIds.set(2, 1002);
    repo.seed({ id: "a", user_id: 1, date: "2024-02-10", supervision_type: "Peer" });
    repo.seed({ id: "b", user_id: 2, date: "2024-02-12" });

    const sendMessage = vi.fn<BotService["sendMessage"]>().mockResolvedValue({
      message_id: 1,
      date: 0,
      chat: { id: 1002, type: "private" },
    });
    const botService: BotService = { sendMessage, onText: vi.fn() };
    const sessionLogService = new SessionLogServiceImpl(
      repo,
      {
        requestedVersion: "2022",
        version: "2022",
        origin: "requested",
        ruleSet: BUILT_IN_RULESET,
      },
      new ComplianceEngine(BUILT_IN_RULESET, "Standard")
    );

    const sent = await sendMonthlySummaries(
      { botService, sessionLogService, sessionRepository: repo },
      new Date(2024, 2, 1, 9, 0)
    );

    expect(sent).toBe(1);
    expect(sendMessage).toHaveBeenCalledTimes(1);
    expect(sendMessage.mock.calls[0][0]).toBe(1002);
  });

  it("does not count undelivered messages", async () => {
    const repo = new InMemorySessionRepository();
    repo.seed({ id: "a", user_id: 1, date: "2024-02-10" });
    const botService: BotService = {
      sendMessage: vi.fn<BotService["sendMessage"]>().mockResolvedValue(undefined),
      onText: vi.fn(),
    };
    const sessionLogService = new SessionLogServiceImpl(
      repo,
      {
        requestedVersion: "2022",
        version: "2022",
        origin: "requested",
        ruleSet: BUILT_IN_RULESET,
      },
      new ComplianceEngine(BUILT_IN_RULESET, "Standard")
    );

    const sent = await sendMonthlySummaries(
      { botService, sessionLogService, sessionRepository: repo },
      new Date(2024, 2, 1, 9, 0)
    );
    expect(sent).toBe(0);
  });
});
