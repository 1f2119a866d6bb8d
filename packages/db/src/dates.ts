/**
 * Calendar helpers for daily statistics.
 */

/**
 * Source of "now". Injected so tests can pin or advance the calendar day.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Format a timestamp as the process-local calendar date `YYYY-MM-DD`.
 */
export function toDateKey(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
