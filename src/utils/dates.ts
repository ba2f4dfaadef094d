/**
 * Calendar date helpers
 *
 * All dates are plain calendar days held as UTC-midnight Date objects, so day
 * arithmetic never crosses a DST boundary.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Build a UTC-midnight date, or null when the parts do not name a real day
 * (e.g. 31/02/2024)
 */
export function makeCalendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Today's local calendar day
 */
export function today(now: Date = new Date()): Date {
  return new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()));
}

/**
 * Parse a dd/mm/yyyy string; returns null on bad format or impossible dates
 */
export function parseSlashDate(value: string): Date | null {
  const match = value.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (!match) return null;

  const [, day, month, year] = match;
  return makeCalendarDate(Number(year), Number(month), Number(day));
}

/**
 * Find the first dd-mm-yyyy date inside free text
 */
export function findDashDate(text: string): Date | null {
  const match = text.match(/(\d{2})-(\d{2})-(\d{4})/);
  if (!match) return null;

  const [, day, month, year] = match;
  return makeCalendarDate(Number(year), Number(month), Number(day));
}

/** Format as dd/mm/yyyy (query parameter format) */
export function formatSlashDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${day}/${month}/${date.getUTCFullYear()}`;
}

/** Format as yyyy-mm-dd */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * MS_PER_DAY);
}
