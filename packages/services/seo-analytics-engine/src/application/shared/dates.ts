/**
 * Calendar-date helpers. Dates travel as YYYY-MM-DD strings computed in UTC,
 * so lexical comparison matches chronological order.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function parseIsoDate(isoDate: string): Date {
  return new Date(`${isoDate}T00:00:00.000Z`);
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(parseIsoDate(isoDate).getTime() + days * MS_PER_DAY));
}

export function subtractDays(isoDate: string, days: number): string {
  return addDays(isoDate, -days);
}

/** Clamps to the last day of the target month (2024-03-31 minus 1 month is 2024-02-29) */
export function subtractMonths(isoDate: string, months: number): string {
  const date = parseIsoDate(isoDate);
  const target = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() - months, 1));
  const lastDay = new Date(Date.UTC(target.getUTCFullYear(), target.getUTCMonth() + 1, 0)).getUTCDate();
  target.setUTCDate(Math.min(date.getUTCDate(), lastDay));
  return toIsoDate(target);
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
