const DAY_MS = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** `YYYY-MM-DD` of a Date in UTC. */
export function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function parseIsoDate(value: string): Date | undefined {
  const m = ISO_DATE.exec(value);
  if (!m) return undefined;
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return isoDate(d) === value ? d : undefined;
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== undefined;
}

export function addDays(date: string, days: number): string {
  const d = parseIsoDate(date);
  if (!d) throw new RangeError(`not an ISO date: ${date}`);
  return isoDate(new Date(d.getTime() + days * DAY_MS));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function diffDays(from: string, to: string): number {
  const a = parseIsoDate(from);
  const b = parseIsoDate(to);
  if (!a || !b) throw new RangeError(`not an ISO date: ${a ? to : from}`);
  return Math.round((b.getTime() - a.getTime()) / DAY_MS);
}

/** Every date from start to end inclusive. */
export function datesBetween(start: string, end: string): string[] {
  const n = diffDays(start, end);
  const out: string[] = [];
  for (let i = 0; i <= n; i++) out.push(addDays(start, i));
  return out;
}

/** Monday of the week after `now` (weeks start on Monday). */
export function nextWeekStart(now: Date): string {
  const dow = now.getUTCDay(); // 0 = Sunday
  const daysToMonday = dow === 0 ? 1 : 8 - dow;
  return addDays(isoDate(now), daysToMonday);
}

/** Coming Saturday, or today when `now` is already Saturday. */
export function upcomingSaturday(now: Date): string {
  const dow = now.getUTCDay();
  return addDays(isoDate(now), (6 - dow + 7) % 7);
}

export function monthOf(date: string): number {
  const d = parseIsoDate(date);
  if (!d) throw new RangeError(`not an ISO date: ${date}`);
  return d.getUTCMonth() + 1;
}
