/** UTC calendar day in `YYYY-MM-DD` form. */
export type Day = string;

const DAY_RE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_SECONDS = 86_400;

export function isDay(value: string): value is Day {
  return DAY_RE.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00Z`));
}

export function dayOf(ms: number): Day {
  return new Date(ms).toISOString().slice(0, 10);
}

/** Unix seconds at 00:00:00 UTC of the day. */
export function dayStartSeconds(day: Day): number {
  return Date.parse(`${day}T00:00:00Z`) / 1000;
}

export function dayEndSeconds(day: Day): number {
  return dayStartSeconds(day) + DAY_SECONDS;
}

export function addDays(day: Day, n: number): Day {
  return dayOf((dayStartSeconds(day) + n * DAY_SECONDS) * 1000);
}

/** Every day from start to end inclusive; empty when start > end. */
export function daysBetween(start: Day, end: Day): Day[] {
  const out: Day[] = [];
  for (let d = start; d <= end; d = addDays(d, 1)) out.push(d);
  return out;
}
