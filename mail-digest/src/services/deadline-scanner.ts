/**
 * Deadline Scanner
 * Finds the first calendar-date phrase in a text and turns it into a
 * "days left" count relative to a reference time.
 *
 * Recognized forms:
 *   December 25 / Dec 25, 2026 / Sept 9th      (month name first)
 *   25 December 2026 / 3rd of March           (day first)
 *   12/25 / 12/25/2026 / 25/12/2026           (slash, month first unless impossible)
 *   12-25-2026                                (dash, month first unless impossible)
 *   25.12.2026                                (dotted, day first)
 *   2026-12-25                                (ISO)
 *
 * Month names must be capitalized, so "may" or "march" in running text is
 * not a date.
 *
 * The candidate starting earliest in the text wins; candidates that are not
 * real calendar dates are skipped in favor of the next one.
 */

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export interface DeadlineCandidate {
  matched: string;
  index: number;
  date: CalendarDate;
}

interface DateParts {
  month: number;
  day: number;
  year: number | null;
}

interface RawCandidate {
  matched: string;
  index: number;
  parts: DateParts;
}

interface DatePattern {
  regex: RegExp;
  toParts: (match: RegExpMatchArray) => DateParts | null;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const MONTH_NAME =
  '(Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|' +
  'Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)';

const ORDINAL = '(?:st|nd|rd|th)?';

const MONTH_INDEX: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12
};

function monthFromName(name: string): number | null {
  return MONTH_INDEX[name.slice(0, 3).toLowerCase()] ?? null;
}

function toYear(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const value = parseInt(raw, 10);
  return raw.length === 2 ? 2000 + value : value;
}

/**
 * Numeric month/day pairs are read month first; when the first number
 * cannot be a month but the second can, they are read day first.
 */
function monthFirstOrSwapped(first: number, second: number, year: number | null): DateParts {
  if (first > 12 && second <= 12) {
    return { month: second, day: first, year };
  }
  return { month: first, day: second, year };
}

function group(match: RegExpMatchArray, index: number): string {
  return match[index] ?? '';
}

const DATE_PATTERNS: DatePattern[] = [
  {
    regex: new RegExp(`\\b${MONTH_NAME}\\.?\\s+(\\d{1,2})${ORDINAL}(?:,?\\s+(\\d{4}))?\\b`, 'g'),
    toParts: (m) => {
      const month = monthFromName(group(m, 1));
      if (month === null) return null;
      return { month, day: parseInt(group(m, 2), 10), year: toYear(m[3]) };
    }
  },
  {
    regex: new RegExp(`\\b(\\d{1,2})${ORDINAL}\\s+(?:of\\s+)?${MONTH_NAME}\\.?(?:,?\\s+(\\d{4}))?\\b`, 'g'),
    toParts: (m) => {
      const month = monthFromName(group(m, 2));
      if (month === null) return null;
      return { month, day: parseInt(group(m, 1), 10), year: toYear(m[3]) };
    }
  },
  {
    regex: /\b(\d{1,2})\/(\d{1,2})(?:\/(\d{4}|\d{2}))?\b/g,
    toParts: (m) => monthFirstOrSwapped(parseInt(group(m, 1), 10), parseInt(group(m, 2), 10), toYear(m[3]))
  },
  {
    regex: /\b(\d{1,2})-(\d{1,2})-(\d{4})\b/g,
    toParts: (m) => monthFirstOrSwapped(parseInt(group(m, 1), 10), parseInt(group(m, 2), 10), toYear(m[3]))
  },
  {
    regex: /\b(\d{1,2})\.(\d{1,2})\.(\d{4})\b/g,
    toParts: (m) => ({ day: parseInt(group(m, 1), 10), month: parseInt(group(m, 2), 10), year: toYear(m[3]) })
  },
  {
    regex: /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/g,
    toParts: (m) => ({ year: toYear(m[1]), month: parseInt(group(m, 2), 10), day: parseInt(group(m, 3), 10) })
  }
];

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isValidCalendarDate(date: CalendarDate): boolean {
  const { year, month, day } = date;
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
  if (year < 1000 || year > 9999) return false;
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

/**
 * Local calendar date of a point in time
 */
export function calendarDateOf(now: Date): CalendarDate {
  return { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
}

function dayNumber(date: CalendarDate): number {
  return Date.UTC(date.year, date.month - 1, date.day) / MS_PER_DAY;
}

/**
 * Signed number of calendar days from `from` to `to`
 */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round(dayNumber(to) - dayNumber(from));
}

export function formatCalendarDate(date: CalendarDate): string {
  const mm = String(date.month).padStart(2, '0');
  const dd = String(date.day).padStart(2, '0');
  return `${date.year}-${mm}-${dd}`;
}

/**
 * Resolve parsed parts to a real date. Yearless dates take the current year,
 * or next year when that date has already passed.
 */
function resolveDate(parts: DateParts, today: CalendarDate): CalendarDate | null {
  if (parts.year !== null) {
    const date = { year: parts.year, month: parts.month, day: parts.day };
    return isValidCalendarDate(date) ? date : null;
  }

  const thisYear = { year: today.year, month: parts.month, day: parts.day };
  if (isValidCalendarDate(thisYear) && daysBetween(today, thisYear) >= 0) {
    return thisYear;
  }

  const nextYear = { year: today.year + 1, month: parts.month, day: parts.day };
  return isValidCalendarDate(nextYear) ? nextYear : null;
}

function collectCandidates(text: string): RawCandidate[] {
  const candidates: RawCandidate[] = [];

  for (const pattern of DATE_PATTERNS) {
    for (const match of text.matchAll(pattern.regex)) {
      const parts = pattern.toParts(match);
      if (parts && match.index !== undefined) {
        candidates.push({ matched: match[0], index: match.index, parts });
      }
    }
  }

  return candidates.sort((a, b) => a.index - b.index || b.matched.length - a.matched.length);
}

/**
 * Find the first date phrase in the text that resolves to a real calendar date.
 * Returns null when there is none; never throws.
 */
export function findDeadline(text: string, now: Date = new Date()): DeadlineCandidate | null {
  if (!text || !text.trim()) return null;

  const today = calendarDateOf(now);

  for (const candidate of collectCandidates(text)) {
    const date = resolveDate(candidate.parts, today);
    if (date) {
      return { matched: candidate.matched, index: candidate.index, date };
    }
  }

  return null;
}

/**
 * Days between now and the first deadline in the text, or null when none is found.
 * Negative when the deadline has passed.
 */
export function computeDaysLeft(text: string, now: Date = new Date()): number | null {
  const deadline = findDeadline(text, now);
  if (!deadline) return null;
  return daysBetween(calendarDateOf(now), deadline.date);
}

export default { findDeadline, computeDaysLeft, daysBetween, calendarDateOf, formatCalendarDate };
