/** Signed percentage with one decimal, e.g. "+12.3%" / "-4.0%". */
export function signedPct(pct: number): string {
  const sign = pct >= 0 ? "+" : "";
  return `${sign}${pct.toFixed(1)}%`;
}

/** Label used when no cause could be derived for a span. */
export function fallbackEvent(pct: number): string {
  return `${signedPct(pct)} move`;
}

export function isoDay(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Shift a YYYY-MM-DD date by whole days (UTC). */
export function addDays(day: string, days: number): string {
  const d = new Date(`${day}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return isoDay(d);
}

export function isIsoDay(s: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(s)) return false;
  const d = new Date(`${s}T00:00:00Z`);
  return !isNaN(+d) && isoDay(d) === s;
}
