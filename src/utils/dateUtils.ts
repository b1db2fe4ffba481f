/**
 * Date utility functions
 */

const MONTH_NAMES: { [key: string]: number } = {
  january: 1, february: 2, march: 3, april: 4,
  may: 5, june: 6, july: 7, august: 8,
  september: 9, october: 10, november: 11, december: 12,
  jan: 1, feb: 2, mar: 3, apr: 4,
  jun: 6, jul: 7, aug: 8, sep: 9, sept: 9,
  oct: 10, nov: 11, dec: 12,
};

/**
 * Format date to YYYY-MM
 */
export function formatYearMonth(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${year}-${month}`;
}

/**
 * Format date to YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Compact local timestamp for file names: YYYYMMDD-HHmmss
 */
export function formatTimestamp(date: Date): string {
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map(part => String(part).padStart(2, '0'))
    .join('');
  return `${formatDate(date).replace(/-/g, '')}-${time}`;
}

/**
 * Start of the day `days` days before `now`
 */
export function lookbackStart(days: number, now: Date = new Date()): Date {
  const date = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  date.setDate(date.getDate() - days);
  return date;
}

export function isWithinRange(date: Date, since: Date, until: Date): boolean {
  const time = date.getTime();
  return time >= since.getTime() && time <= until.getTime();
}

function buildDate(year: number, month: number, day: number): Date | undefined {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return undefined;
  }
  const date = new Date(year, month - 1, day);
  // Rejects overflow such as February 30
  if (date.getMonth() !== month - 1) {
    return undefined;
  }
  return date;
}

/**
 * Find an order date in free text as shown on portal order pages.
 * Accepts "October 3, 2026", "Oct 03, 2026", "3 October 2026",
 * "2026-10-03" and "10/03/2026" (US order). ISO dates take precedence over
 * the other forms; within a form the first valid date wins.
 */
export function parseOrderDate(text: string): Date | undefined {
  for (const match of text.matchAll(/\b(\d{4})-(\d{2})-(\d{2})\b/g)) {
    const date = buildDate(Number(match[1]), Number(match[2]), Number(match[3]));
    if (date) return date;
  }

  for (const match of text.matchAll(/\b([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})\b/g)) {
    const month = MONTH_NAMES[match[1].toLowerCase()];
    const date = month ? buildDate(Number(match[3]), month, Number(match[2])) : undefined;
    if (date) return date;
  }

  for (const match of text.matchAll(/\b(\d{1,2})\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})\b/g)) {
    const month = MONTH_NAMES[match[2].toLowerCase()];
    const date = month ? buildDate(Number(match[3]), month, Number(match[1])) : undefined;
    if (date) return date;
  }

  for (const match of text.matchAll(/\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/g)) {
    const date = buildDate(Number(match[3]), Number(match[1]), Number(match[2]));
    if (date) return date;
  }

  return undefined;
}
