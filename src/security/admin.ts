export function parseAdminIds(raw: string): number[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "")
    .map(Number)
    .filter(Number.isFinite);
}

export function isAdmin(
  tgUserId: number | undefined,
  raw: string = process.env.ADMIN_IDS ?? ""
): boolean {
  if (!tgUserId) return false;
  return parseAdminIds(raw).includes(tgUserId);
}
