const DAY_MS = 24 * 60 * 60 * 1000;

/** `YYYY-MM-DD` of the instant, in UTC like every stored timestamp. */
export function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `YYYY-MM` of the instant, in UTC. */
export function isoMonth(date: Date): string {
  return date.toISOString().slice(0, 7);
}

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}
