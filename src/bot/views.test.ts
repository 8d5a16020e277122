import { describe, it, expect } from "vitest";
import { escapeMdV2, fmtHours, fmtPercent, renderErrors, renderSessionLine } from "./views.js";

describe("MarkdownV2 views", () => {
  it("escapes every reserved character", () => {
    expect(escapeMdV2("a_b*c[d](e)~f`g>h#i+j-k=l|m{n}o.p!q\\r")).toBe(
      "a\\_b\\*c\\[d\\]\\(e\\)\\~f\\`g\\>h\\#i\\+j\\-k\\=l\\|m\\{n\\}o\\.p\\!q\\\\r"
    );
  });

  it("formats hours and percentages", () => {
    expect(fmtHours(1.5)).toBe("1\\.50h");
    expect(fmtPercent(0.1)).toBe("10\\.0%");
  });

  it("lists audit errors", () => {
    expect(renderErrors("Session not saved", ["AUDIT RISK: too long (13.00h)."])).toBe(
      "🛑 *Session not saved*\n• AUDIT RISK: too long \\(13\\.00h\\)\\."
    );
  });

  it("renders one stored session", () => {
    expect(
      renderSessionLine({
        id: "abc_12-x",
        user_id: 1,
        date: "2024-03-01",
        start_time: "09:00:00",
        end_time: "10:30:00",
        duration_hours: 1.5,
        activity_type: "Restricted",
        supervision_type: "Group",
        supervisor: "Dr. Kim",
        energy_rating: null,
        notes: "",
        created_at: "2024-03-01 10:31:00",
      })
    ).toBe(
      "`abc_12-x` 09:00–10:30 · 1\\.50h · Restricted · Group · Dr\\. Kim"
    );
  });
});
