/**
 * Calendar helpers in a fixed UTC offset. Tenants share one configured
 * offset (minutes east of UTC), so "the 28th" and "today" are stable
 * across process restarts and host time zones.
 */

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

function shifted(now: Date, offsetMinutes: number): Date {
  return new Date(now.getTime() + offsetMinutes * MS_PER_MINUTE);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** "2024-05" */
export function yearMonthKey(now: Date, offsetMinutes: number): string {
  const local = shifted(now, offsetMinutes);
  return `${String(local.getUTCFullYear())}-${pad(local.getUTCMonth() + 1)}`;
}

/** "2024-05-28" */
export function dateKey(now: Date, offsetMinutes: number): string {
  const local = shifted(now, offsetMinutes);
  return `${yearMonthKey(now, offsetMinutes)}-${pad(local.getUTCDate())}`;
}

export function dayOfMonth(now: Date, offsetMinutes: number): number {
  return shifted(now, offsetMinutes).getUTCDate();
}

/**
 * Date key `days` before `now`.
 */
export function dateKeyDaysAgo(now: Date, days: number, offsetMinutes: number): string {
  return dateKey(new Date(now.getTime() - days * MS_PER_DAY), offsetMinutes);
}

export function addHours(from: Date, hours: number): Date {
  return new Date(from.getTime() + hours * 60 * MS_PER_MINUTE);
}
