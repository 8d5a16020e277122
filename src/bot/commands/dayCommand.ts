import { isIsoDate, localIsoDate } from "../../domain/time.js";
import { escapeMdV2, renderSessionLine } from "../views.js";
import { BaseCommand } from "./baseCommand.js";

export class DayCommand extends BaseCommand {
  public static readonly commandId = "day";
  public static readonly regex = /^\/day(?:@\w+)?(?:\s+(\S+))?$/i;

  private date = "";

  protected async validate(): Promise<boolean> {
    this.date = this.match?.[1] ?? localIsoDate();
    if (!isIsoDate(this.date)) {
      await this.sendMessage("Use /day YYYY\\-MM\\-DD\\.");
      return false;
    }
    return true;
  }

  protected async process(): Promise<void> {
    const rows = await this.sessionLogService.sessionsOn(this.userId, this.date);
    const heading = `*Sessions on ${escapeMdV2(this.date)}*`;
    const body = rows.length
      ? rows.map(renderSessionLine).join("\n")
      : "_none logged_";
    await this.sendMessage(`${heading}\n${body}`);
  }
}
