import { localIsoDate } from "../../domain/time.js";
import { MonthlyStatsPresenter } from "../../presentation/monthlyStatsPresenter.js";
import { parseLogArgs } from "../logSyntax.js";
import { escapeMdV2, fmtHours, renderErrors } from "../views.js";
import { BaseCommand } from "./baseCommand.js";

export class LogCommand extends BaseCommand {
  public static readonly commandId = "log";
  public static readonly regex = /^\/log(?:@\w+)?(?:\s+([\s\S]*))?$/i;

  protected async process(): Promise<void> {
    const args = parseLogArgs(this.match?.[1] ?? "", localIsoDate());
    if (!args.ok) {
      await this.sendMessage(escapeMdV2(args.error));
      return;
    }

    const outcome = await this.sessionLogService.logSession(
      this.userId,
      args.draft
    );
    if (outcome.status === "rejected") {
      await this.sendMessage(renderErrors("Session not saved", outcome.errors));
      return;
    }

    const r = outcome.record;
    const saved =
      `✅ Saved \`${r.id}\` · ${escapeMdV2(r.date)} · ${fmtHours(
        r.durationHours
      )}\n\n` +
      MonthlyStatsPresenter.toMarkdownV2(
        outcome.report,
        this.sessionLogService.engine
      );
    await this.sendMessage(saved);
  }
}
