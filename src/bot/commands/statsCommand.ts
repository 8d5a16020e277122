import { MonthlyStatsPresenter } from "../../presentation/monthlyStatsPresenter.js";
import { BaseCommand } from "./baseCommand.js";

export class StatsCommand extends BaseCommand {
  public static readonly commandId = "stats";
  // Supports: /stats                     -> current month
  //           /stats 2024-03, 2024-3     -> given month
  //           /stats 2024-03 Dr Lee      -> given month, one supervisor
  public static readonly regex =
    /^\/stats(?:@\w+)?(?:\s+(\d{4})-(\d{1,2}))?(?:\s+(.+))?$/i;

  private year = 0;
  private month = 0;

  protected async validate(): Promise<boolean> {
    const now = new Date();
    this.year = this.match?.[1] ? Number(this.match[1]) : now.getFullYear();
    this.month = this.match?.[2] ? Number(this.match[2]) : now.getMonth() + 1;
    if (this.month < 1 || this.month > 12) {
      await this.sendMessage("Month must be between 01 and 12\\.");
      return false;
    }
    return true;
  }

  protected async process(): Promise<void> {
    const supervisor = this.match?.[3]?.trim() || undefined;
    const report = await this.sessionLogService.monthReport(this.userId, {
      year: this.year,
      month: this.month,
      supervisor,
    });
    await this.sendMessage(
      MonthlyStatsPresenter.toMarkdownV2(report, this.sessionLogService.engine)
    );
  }
}
