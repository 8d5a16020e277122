import { describe, it, expect } from "vitest";
import { isAdmin, parseAdminIds } from "./admin.js";

describe("admin ids", () => {
  it("parses a comma list and drops junk", () => {
    expect(parseAdminIds(" 11, 22 ,abc,,33")).toEqual([11, 22, 33]);
    expect(parseAdminIds("")).toEqual([]);
  });

  it("checks membership", () => {
    expect(isAdmin(22, "11,22")).toBe(true);
    expect(isAdmin(23, "11,22")).toBe(false);
    expect(isAdmin(undefined, "11,22")).toBe(false);
  });
});
