import { AUDIT_THRESHOLD_HOURS } from "../../domain/policy.js";
import { LOG_USAGE } from "../logSyntax.js";
import { escapeMdV2, mdv2Cmd } from "../views.js";
import { BaseCommand } from "./baseCommand.js";

export class StartCommand extends BaseCommand {
  public static readonly commandId = "start";
  public static readonly regex = /^\/(?:start|help)\b/i;

  public async process(): Promise<void> {
    const greetingName: string = this.firstName ?? "there";

    const text: string =
      `Welcome, ${escapeMdV2(greetingName)}\\! 👋\n` +
      `I keep your fieldwork log and check it against the certification rules\\.\n\n` +
      `Commands:\n` +
      `• ${mdv2Cmd("log")} — record a session 📝\n` +
      `  ${escapeMdV2(LOG_USAGE)}\n` +
      `• ${mdv2Cmd("stats")} \\[YYYY\\-MM\\] \\[supervisor\\] — monthly compliance 📊\n` +
      `• ${mdv2Cmd("day")} \\[YYYY\\-MM\\-DD\\] — sessions of a day\n` +
      `• ${mdv2Cmd("delete")} <id> — remove a session\n` +
      `• ${mdv2Cmd("rules")} — active ruleset\n\n` +
      `Sessions over ${escapeMdV2(
        AUDIT_THRESHOLD_HOURS.toFixed(1)
      )}h or overlapping another session are refused\\.`;

    await this.sendMessage(text);
  }
}
