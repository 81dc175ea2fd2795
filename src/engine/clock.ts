// Injected time source, Unix ms
export type Clock = () => number;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * UTC calendar day `YYYY-MM-DD` containing `ts`
 */
export function utcDate(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

export function utcDayStart(ts: number): number {
  return Math.floor(ts / DAY_MS) * DAY_MS;
}
