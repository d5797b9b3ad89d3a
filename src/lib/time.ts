const DAY_MS = 86_400_000;

/**
 * Calendar date (YYYY-MM-DD, UTC) of an ISO timestamp or date; null if unparseable.
 * US option sessions fall inside one UTC date, so the UTC date is the trade date.
 */
export function isoDate(value: string): string | null {
  const t = Date.parse(value.length === 10 ? `${value}T00:00:00Z` : value);
  if (!Number.isFinite(t)) return null;
  return new Date(t).toISOString().slice(0, 10);
}

// Whole days from `from` to `to` (both YYYY-MM-DD); negative when `to` is earlier.
export function daysBetween(from: string, to: string): number {
  const a = Date.parse(`${from}T00:00:00Z`);
  const b = Date.parse(`${to}T00:00:00Z`);
  return Math.round((b - a) / DAY_MS);
}

export function addMinutes(iso: string, minutes: number): string {
  return new Date(Date.parse(iso) + minutes * 60_000).toISOString();
}
