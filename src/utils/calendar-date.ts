/**
 * Calendar dates as ISO `YYYY-MM-DD` strings.
 *
 * Tariff windows and economic cycles are whole days, so they are compared as
 * strings rather than as `Date` instants (lexical order equals date order).
 */
export type IsoDate = string;

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== 'string' || !ISO_DATE_PATTERN.test(value)) {
    return false;
  }

  const [year, month, day] = value.split('-').map(Number);
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

export function compareIsoDates(a: IsoDate, b: IsoDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Inclusive window check; a null upper bound means open-ended.
 */
export function isWithinWindow(date: IsoDate, from: IsoDate, to: IsoDate | null): boolean {
  if (compareIsoDates(date, from) < 0) {
    return false;
  }
  return to === null || compareIsoDates(date, to) <= 0;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/**
 * Current calendar date in the given IANA time zone.
 */
export function todayIn(timeZone: string, now: Date = new Date()): IsoDate {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')}`;
}

/**
 * Monthly period key (`YYYY-MM`) a date belongs to.
 */
export function periodKeyOf(date: IsoDate): string {
  return date.slice(0, 7);
}

export interface CycleDates {
  startDate: IsoDate;
  endDate: IsoDate;
}

/**
 * Billing cycle closing in the given month: the 19th of the previous month
 * through the 18th of this one.
 */
export function cycleDatesFor(year: number, month: number): CycleDates {
  const previousYear = month === 1 ? year - 1 : year;
  const previousMonth = month === 1 ? 12 : month - 1;

  return {
    startDate: `${previousYear}-${pad2(previousMonth)}-19`,
    endDate: `${year}-${pad2(month)}-18`,
  };
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}
