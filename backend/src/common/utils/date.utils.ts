export const DAY_MS = 24 * 60 * 60 * 1000;

export function addDaysUtc(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** `YYYY-MM-DD` in UTC. */
export function fmtDateUtc(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** `YYYY-MM-DD HH:mm` in UTC. */
export function fmtDateTimeUtc(d: Date): string {
  return d.toISOString().slice(0, 16).replace('T', ' ');
}
