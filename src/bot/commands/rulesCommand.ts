import type { RuleSetOrigin } from "../../domain/rules/types.js";
import { escapeMdV2, fmtPercent } from "../views.js";
import { BaseCommand } from "./baseCommand.js";

const ORIGIN_LABEL: Record<RuleSetOrigin, string> = {
  requested: "as configured",
  "fallback-version": "fallback version",
  "built-in": "built-in defaults",
};

export class RulesCommand extends BaseCommand {
  public static readonly commandId = "rules";
  public static readonly regex = /^\/rules(?:@\w+)?$/i;

  protected async process(): Promise<void> {
    const { resolution, engine } = this.sessionLogService;
    const r = engine.rules;
    const ratios = Object.entries(r.supervisionRatios)
      .map(([mode, ratio]) => `${escapeMdV2(mode)} ${fmtPercent(ratio)}`)
      .join(", ");

    const text =
      `*Ruleset ${escapeMdV2(resolution.version)}* \\(${escapeMdV2(
        ORIGIN_LABEL[resolution.origin]
      )}\\)\n` +
      (resolution.origin !== "requested"
        ? `⚠️ Requested ${escapeMdV2(resolution.requestedVersion)} was not available\\.\n`
        : "") +
      `Mode: *${escapeMdV2(engine.mode)}* · required supervision *${fmtPercent(
        engine.requiredRatio
      )}*\n` +
      `Monthly hours: ${escapeMdV2(String(r.monthlyMinHours))}–${escapeMdV2(
        String(r.monthlyMaxHours)
      )}\n` +
      `Supervision ratios: ${ratios}\n` +
      `Group supervision cap \\(advisory\\): ${fmtPercent(
        r.groupSupervisionMaxPercent
      )}`;
    await this.sendMessage(text);
  }
}
