import cron, { type ScheduledTask } from "node-cron";
import { logger } from "../logger.js";
import { previousMonth } from "../domain/compliance/period.js";
import { MonthlyStatsPresenter } from "../presentation/monthlyStatsPresenter.js";
import type { BotService } from "../services/bot.service.js";
import type { SessionLogService } from "../sessionlog/sessionLogService.js";
import type { SessionRepository } from "../sessionlog/sessionRepository.js";

export interface SummaryDeps {
  botService: BotService;
  sessionLogService: SessionLogService;
  sessionRepository: SessionRepository;
}

/**
 * Send last month's compliance summary to every trainee who logged time in
 * it. Returns how many summaries went out.
 */
export async function sendMonthlySummaries(
  deps: SummaryDeps,
  now: Date = new Date()
): Promise<number> {
  const { year, month } = previousMonth(now);
  const trainees = await deps.sessionRepository.listTraineesWithSessions(
    year,
    month
  );

  let sent = 0;
  for (const t of trainees) {
    // one trainee's bad data or failed send must not hold back the rest
    try {
      const report = await deps.sessionLogService.monthReport(t.userId, {
        year,
        month,
      });
      const text =
        "📅 *Monthly summary*\n\n" +
        MonthlyStatsPresenter.toMarkdownV2(
          report,
          deps.sessionLogService.engine
        );
      const delivered = await deps.botService.sendMessage(t.tgUserId, text, {
        parse_mode: "MarkdownV2",
      });
      if (delivered) sent++;
    } catch (err) {
      logger.error("Monthly summary failed for trainee", {
        err,
        userId: t.userId,
        year,
        month,
      });
    }
  }
  return sent;
}

export function startScheduler(
  deps: SummaryDeps,
  expression: string
): ScheduledTask {
  return cron.schedule(expression, async () => {
    try {
      const sent = await sendMonthlySummaries(deps);
      logger.info(`Monthly summaries sent: ${sent}`);
    } catch (err) {
      logger.error("Monthly summary run failed", { err });
    }
  });
}
