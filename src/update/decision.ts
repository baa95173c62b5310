/**
 * Incremental update decision
 */

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar date of a stored timestamp as YYYY-MM-DD in the given time zone
 */
export function toDateKey(date: Date, timeZone = 'UTC'): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((item) => item.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')}`;
}

/**
 * A review must be rewritten when it was never updated, or when its last
 * update falls on a day strictly before the posted date. Days are taken in
 * `timeZone`; times of day are ignored.
 */
export function needsUpdate(storedUpdatedAt: Date | null, postedDate: string, timeZone = 'UTC'): boolean {
  if (!DATE_PATTERN.test(postedDate)) {
    throw new Error(`Posted date must be YYYY-MM-DD, got "${postedDate}"`);
  }
  if (!storedUpdatedAt || Number.isNaN(storedUpdatedAt.getTime())) {
    return true;
  }
  return toDateKey(storedUpdatedAt, timeZone) < postedDate;
}
