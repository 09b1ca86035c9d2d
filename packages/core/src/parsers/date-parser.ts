/**
 * Parses due-date input into yyyy-MM-dd format.
 * Supports: DD/MM/YYYY, yyyy-MM-dd, today, tomorrow, yesterday,
 * relative (+3d/+2w/+1m), day-of-week names (mon-sunday) and month+day (jan15).
 */

const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;
const DAY_MONTH_YEAR_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

/** Format a Date as yyyy-MM-dd */
export function formatDate(d: Date): string {
  const y = String(d.getFullYear()).padStart(4, '0');
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Render a stored yyyy-MM-dd date as DD/MM/YYYY */
export function formatDisplayDate(isoDate: string): string {
  const m = ISO_DATE_RE.exec(isoDate);
  if (!m) return isoDate;
  return `${m[3]}/${m[2]}/${m[1]}`;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

/** Build a date from calendar parts, or null if the parts don't name a real day (e.g. 30/02) */
function fromParts(year: number, month: number, day: number): string | null {
  const d = new Date(year, month - 1, day);
  if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) {
    return null;
  }
  return formatDate(d);
}

function tryParseRelative(input: string, today: Date): string | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const count = parseInt(m[1] ?? '0', 10);
  switch (m[2]) {
    case 'd': return formatDate(addDays(today, count));
    case 'w': return formatDate(addDays(today, count * 7));
    case 'm': return formatDate(addMonths(today, count));
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): string | null {
  if (!Object.hasOwn(DAY_MAP, input)) return null;
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let daysUntil = (target - today.getDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // Next week if today
  return formatDate(addDays(today, daysUntil));
}

function tryParseMonthDay(input: string, today: Date): string | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m) return null;

  const month = MONTH_MAP[m[1] ?? ''];
  if (month === undefined) return null;
  const day = parseInt(m[2] ?? '0', 10);

  const candidate = fromParts(today.getFullYear(), month + 1, day);
  if (!candidate) return null;

  // If the date is in the past, use next year
  if (candidate < formatDate(today)) {
    return fromParts(today.getFullYear() + 1, month + 1, day);
  }
  return candidate;
}

function tryParseDayMonthYear(input: string): string | null {
  const m = DAY_MONTH_YEAR_RE.exec(input);
  if (!m) return null;
  return fromParts(Number(m[3]), Number(m[2]), Number(m[1]));
}

function tryParseStandard(input: string): string | null {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return null;
  return fromParts(Number(m[1]), Number(m[2]), Number(m[3]));
}

/**
 * Parse a due-date string into yyyy-MM-dd format.
 * Returns null if the input can't be parsed.
 *
 * @param input - Date string (e.g. "31/12/2030", "2030-12-31", "today", "+3d", "friday", "jan15")
 * @param now - Override "today" for testing. Defaults to current date.
 */
export function parseDate(input: string | null | undefined, now?: Date): string | null {
  if (!input?.trim()) return null;

  const today = new Date(now ?? new Date());
  // Zero out time component for consistent date math
  today.setHours(0, 0, 0, 0);

  const normalized = input.trim().toLowerCase();

  switch (normalized) {
    case 'today': return formatDate(today);
    case 'tomorrow': return formatDate(addDays(today, 1));
    case 'yesterday': return formatDate(addDays(today, -1));
    default:
      return tryParseDayMonthYear(normalized)
        ?? tryParseStandard(normalized)
        ?? tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? tryParseMonthDay(normalized, today);
  }
}
