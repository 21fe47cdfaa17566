/**
 * Deadline dates. `parseDate` turns what people type after `/by` into a
 * canonical `yyyy-MM-dd` or `yyyy-MM-dd HH:mm` string, and
 * `formatDisplayDate` turns a canonical string back into something readable.
 *
 * Understood input: today, tomorrow and yesterday; offsets such as +3d, +2w
 * and +1m; weekday names, full or cut to three letters; a month and day run
 * together (jan15); ISO dates with an optional 24-hour time
 * (2024-01-01, 2024-01-01 1800, 2024-01-01 18:00).
 */

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'] as const;

const NAMED_DAYS: Record<string, number> = { yesterday: -1, today: 0, tomorrow: 1 };

const OFFSET_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = new RegExp(`^(${MONTHS.join('|')})(\\d{1,2})$`);
const ISO_INPUT_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):?(\d{2}))?$/;
const CANONICAL_RE = /^(\d{4})-(\d{2})-(\d{2})(?: (\d{2}):(\d{2}))?$/;

interface Shift {
  days?: number;
  months?: number;
}

const pad = (n: number): string => String(n).padStart(2, '0');

function toDay(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

function shift(from: Date, by: Shift): Date {
  const d = new Date(from);
  if (by.months) d.setMonth(d.getMonth() + by.months);
  if (by.days) d.setDate(d.getDate() + by.days);
  return d;
}

/** A local midnight, or null when Date would roll the parts over (feb30) */
function calendarDate(year: number, monthIndex: number, day: number): Date | null {
  const d = new Date(year, monthIndex, day);
  const exact = d.getFullYear() === year && d.getMonth() === monthIndex && d.getDate() === day;
  return exact ? d : null;
}

function isClockTime(hours: number, minutes: number): boolean {
  return hours <= 23 && minutes <= 59;
}

function offsetDate(word: string, today: Date): Date | null {
  const m = OFFSET_RE.exec(word);
  if (!m) return null;

  const [, amount, unit] = m;
  const count = Number(amount);
  if (unit === 'm') return shift(today, { months: count });
  return shift(today, { days: unit === 'w' ? count * 7 : count });
}

/** The next such weekday; naming today's weekday means a week from now */
function weekdayDate(word: string, today: Date): Date | null {
  const target = WEEKDAYS.findIndex(name => word === name || word === name.slice(0, 3));
  if (target < 0) return null;
  return shift(today, { days: ((target - today.getDay() + 6) % 7) + 1 });
}

function monthDayDate(word: string, today: Date): Date | null {
  const m = MONTH_DAY_RE.exec(word);
  if (!m) return null;

  const month = MONTHS.findIndex(name => name === m[1]);
  const day = Number(m[2]);
  if (month < 0) return null;

  const thisYear = calendarDate(today.getFullYear(), month, day);
  if (!thisYear || thisYear.getTime() >= today.getTime()) return thisYear;
  return calendarDate(today.getFullYear() + 1, month, day);
}

function isoDate(text: string): string | null {
  const m = ISO_INPUT_RE.exec(text);
  if (!m) return null;

  const [, y, mo, d, hh, mm] = m;
  if (!calendarDate(Number(y), Number(mo) - 1, Number(d))) return null;

  const day = `${y}-${mo}-${d}`;
  if (hh === undefined || mm === undefined) return day;
  return isClockTime(Number(hh), Number(mm)) ? `${day} ${hh}:${mm}` : null;
}

/**
 * Parse date text into canonical form, or null when it is not a date this
 * module understands.
 *
 * @param now - stands in for the current time; only its calendar day is used
 */
export function parseDate(input: string | null | undefined, now?: Date): string | null {
  const text = input?.trim();
  if (!text) return null;

  const today = new Date(now ?? Date.now());
  today.setHours(0, 0, 0, 0);
  const word = text.toLowerCase();

  const named = NAMED_DAYS[word];
  const relative = named !== undefined
    ? shift(today, { days: named })
    : offsetDate(word, today) ?? weekdayDate(word, today) ?? monthDayDate(word, today);

  if (relative) return Number.isNaN(relative.getTime()) ? null : toDay(relative);
  return isoDate(text);
}

/**
 * Render a canonical date for people: "Jan 1, 2024" or "Jan 1, 2024, 18:00".
 * Anything else, including an impossible day or clock time, comes back as-is.
 */
export function formatDisplayDate(value: string): string {
  const m = CANONICAL_RE.exec(value);
  if (!m) return value;

  const [, y, mo, d, hh, mm] = m;
  const date = calendarDate(Number(y), Number(mo) - 1, Number(d));
  if (!date) return value;

  const label = date.toLocaleDateString('en-US', { month: 'short', day: 'numeric', year: 'numeric' });
  if (hh === undefined || mm === undefined) return label;
  return isClockTime(Number(hh), Number(mm)) ? `${label}, ${hh}:${mm}` : value;
}
