import type { SessionRow } from "../sessionlog/types.js";

// Escape for Telegram MarkdownV2 (NOT legacy)
// Special set: _ * [ ] ( ) ~ ` > # + - = | { } . ! and backslash itself.
export function escapeMdV2(s: string): string {
  return s.replace(/([_*\[\]()~`>#+\-=|{}.!\\])/g, "\\$1");
}

export function mdv2Cmd(cmd: string): string {
  return `/${cmd.replace(/_/g, "\\_")}`; // keeps it clickable in V2
}

export function fmtHours(hours: number): string {
  return `${escapeMdV2(hours.toFixed(2))}h`;
}

export function fmtPercent(fraction: number): string {
  return `${escapeMdV2((fraction * 100).toFixed(1))}%`;
}

export function renderErrors(title: string, errors: readonly string[]): string {
  const lines = errors.map((e) => `• ${escapeMdV2(e)}`);
  return [`🛑 *${escapeMdV2(title)}*`, ...lines].join("\n");
}

export function renderSessionLine(row: SessionRow): string {
  const who = row.supervisor ? ` · ${escapeMdV2(row.supervisor)}` : "";
  return (
    `\`${row.id}\` ${escapeMdV2(row.start_time.slice(0, 5))}–${escapeMdV2(
      row.end_time.slice(0, 5)
    )} · ${fmtHours(Number(row.duration_hours))} · ` +
    `${escapeMdV2(row.activity_type)} · ${escapeMdV2(
      row.supervision_type ?? "None"
    )}${who}`
  );
}
