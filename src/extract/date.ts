export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export const EMPTY_FIELD = '-';

const NUMERIC_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{2,4})/;
const WRITTEN_DATE = /^\d{1,2}\s[A-Za-z]+\s\d{4}/;

/**
 * Two-digit years are placed in a window that slides with the run date: anything
 * above (current two-digit year + 5) is read as 19YY, everything else as 20YY.
 */
export function resolveTwoDigitYear(year: number, now: Date): number {
  const pivot = (now.getFullYear() % 100) + 5;
  return year > pivot ? 1900 + year : 2000 + year;
}

/**
 * Normalizes `D.M.YYYY` / `D.M.YY` cell text to `"{day} {Month} {year}"`.
 *
 * Blank or "-" input yields "-". Text already written as `D Month YYYY` is
 * returned trimmed; anything else that does not parse comes back verbatim.
 */
export function parseDate(value: string | null | undefined, now: Date = new Date()): string {
  if (value === null || value === undefined) {
    return EMPTY_FIELD;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0 || trimmed === EMPTY_FIELD) {
    return EMPTY_FIELD;
  }

  const compact = value.replace(/\s+/g, '');
  const match = compact.match(NUMERIC_DATE);
  if (match) {
    const day = Number.parseInt(match[1], 10);
    const month = Number.parseInt(match[2], 10);
    let year = Number.parseInt(match[3], 10);

    // two digits as written: "05" takes the window, "0095" stays year 95
    if (match[3].length === 2) {
      year = resolveTwoDigitYear(year, now);
    }

    const monthName = MONTH_NAMES[month - 1] ?? String(month);
    return `${day} ${monthName} ${year}`;
  }

  if (WRITTEN_DATE.test(trimmed)) {
    return trimmed;
  }

  return value;
}
