/**
 * Prices travel through the API as decimal numbers and are stored as integer
 * cents so that line snapshots and totals add up exactly.
 */
export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function averageCents(totalCents: number, count: number): number {
  return count > 0 ? Math.round(totalCents / count) : 0;
}
