/**
 * HL7v2 date parsing (DT / leading date part of DTM)
 */

/**
 * Parse the leading YYYYMMDD of an HL7v2 date or timestamp into `YYYY-MM-DD`.
 *
 * Year must be within 1900..2100, month 1..12 and day 1..31. Days are not
 * checked against the month. Anything else yields undefined.
 */
export function parseHl7Date(value: string | undefined): string | undefined {
  if (!value || value.length < 8) {
    return undefined;
  }

  const year = value.substring(0, 4);
  const month = value.substring(4, 6);
  const day = value.substring(6, 8);

  if (!isDigits(year) || !isDigits(month) || !isDigits(day)) {
    return undefined;
  }

  const y = parseInt(year, 10);
  const m = parseInt(month, 10);
  const d = parseInt(day, 10);

  if (y < 1900 || y > 2100 || m < 1 || m > 12 || d < 1 || d > 31) {
    return undefined;
  }

  return `${y}-${String(m).padStart(2, '0')}-${String(d).padStart(2, '0')}`;
}

function isDigits(value: string): boolean {
  return /^\d+$/.test(value);
}
