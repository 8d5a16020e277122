import type { ComplianceEngine } from "../domain/compliance/complianceEngine.js";
import { monthPrefix } from "../domain/compliance/period.js";
import type { MonthReport } from "../sessionlog/types.js";
import { escapeMdV2, fmtHours, fmtPercent } from "../bot/views.js";

type EngineView = Pick<ComplianceEngine, "rules" | "requiredRatio">;

function flag(ok: boolean, label: string): string {
  return `${ok ? "✅" : "❌"} ${label}`;
}

export class MonthlyStatsPresenter {
  public static toMarkdownV2(report: MonthReport, engine: EngineView): string {
    const s = report.stats;
    const rules = engine.rules;

    const title =
      `*Fieldwork ${escapeMdV2(monthPrefix(report.year, report.month))}*` +
      (report.supervisor
        ? ` · supervisor: ${escapeMdV2(report.supervisor)}`
        : "");

    const supervision =
      !s.isCompliantSupervision && s.hoursNeededForRatio > 0
        ? `❌ Supervision ratio — *${fmtHours(
            s.hoursNeededForRatio
          )}* more supervised time needed`
        : flag(s.isCompliantSupervision, "Supervision ratio");

    return [
      title,
      `Sessions: *${report.sessions}*`,
      `Total: *${fmtHours(s.totalHours)}* \\(min ${escapeMdV2(
        String(rules.monthlyMinHours)
      )}, max ${escapeMdV2(String(rules.monthlyMaxHours))}\\)`,
      `Supervised: *${fmtHours(s.supervisedHours)}* · Independent: *${fmtHours(
        s.independentHours
      )}*`,
      `Supervision: *${fmtPercent(s.supervisionPercent)}* of *${fmtPercent(
        engine.requiredRatio
      )}* required`,
      "",
      flag(s.isCompliantMinHours, "Minimum hours"),
      flag(s.isCompliantMaxHours, "Maximum hours"),
      supervision,
    ].join("\n");
  }
}
