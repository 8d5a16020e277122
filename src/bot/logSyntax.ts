import type { SessionDraftInput } from "../domain/session/sessionDraft.js";

export const LOG_USAGE =
  "/log <YYYY-MM-DD|today> <start> <end> <restricted|unrestricted> " +
  "<none|individual|group> [supervisor] [energy=1-5] [| notes]";

export type LogArgs =
  | { ok: true; draft: SessionDraftInput }
  | { ok: false; error: string };

const ENERGY_RE = /^energy=(\d)$/i;

/**
 * Parse the text after `/log`. Only splits tokens; values are validated when
 * the record is built.
 */
export function parseLogArgs(text: string, today: string): LogArgs {
  const [main, ...noteParts] = text.split("|");
  const notes = noteParts.join("|").trim();
  const tokens = main.trim().split(/\s+/).filter(Boolean);

  if (tokens.length < 5) {
    return { ok: false, error: `Usage: ${LOG_USAGE}` };
  }

  const [date, startTime, endTime, activityType, supervisionType, ...rest] =
    tokens;

  let energyRating: number | null = null;
  const supervisorTokens: string[] = [];
  for (const t of rest) {
    const m = ENERGY_RE.exec(t);
    if (m) energyRating = Number(m[1]);
    else supervisorTokens.push(t);
  }

  return {
    ok: true,
    draft: {
      date: date.toLowerCase() === "today" ? today : date,
      startTime,
      endTime,
      activityType,
      supervisionType,
      supervisor: supervisorTokens.join(" "),
      energyRating,
      notes,
    },
  };
}
