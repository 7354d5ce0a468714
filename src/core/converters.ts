/**
 * Text → typed value conversions shared by both accessors.
 * Each returns undefined when the text does not convert.
 */

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DOUBLE_PATTERN = /^[+-]?(?:\d[\d,]*)?(?:\.\d*)?(?:[eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)(?:infinity|∞)$/i;
const ISO_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ]((?:[01]\d|2[0-3]):[0-5]\d(?::[0-5]\d(?:\.\d{1,3})?)?(?:Z|[+-](?:[01]\d|2[0-3]):[0-5]\d)?))?$/;

/**
 * "true" / "false", ignoring case and surrounding whitespace
 */
export function parseBoolean(text: string | undefined): boolean | undefined {
  if (text === undefined) {
    return undefined;
  }

  const normalized = text.trim().toLowerCase();
  if (normalized === 'true') {
    return true;
  }
  if (normalized === 'false') {
    return false;
  }
  return undefined;
}

export function parseInt32(text: string | undefined): number | undefined {
  if (text === undefined) {
    return undefined;
  }

  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return undefined;
  }

  const parsed = Number(trimmed);
  if (parsed < INT32_MIN || parsed > INT32_MAX) {
    return undefined;
  }
  // Normalizes "-0"
  return parsed === 0 ? 0 : parsed;
}

export function parseInt64(text: string | undefined): bigint | undefined {
  if (text === undefined) {
    return undefined;
  }

  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return undefined;
  }

  const parsed = BigInt(trimmed.startsWith('+') ? trimmed.slice(1) : trimmed);
  if (parsed < INT64_MIN || parsed > INT64_MAX) {
    return undefined;
  }
  return parsed;
}

/**
 * Decimal or exponent notation, with optional "," group separators in the
 * integer part. Infinity and NaN are accepted by name.
 */
export function parseDouble(text: string | undefined): number | undefined {
  if (text === undefined) {
    return undefined;
  }

  const trimmed = text.trim();

  const infinity = INFINITY_PATTERN.exec(trimmed);
  if (infinity) {
    return infinity[1] === '-' ? -Infinity : Infinity;
  }
  if (trimmed.toLowerCase() === 'nan') {
    return NaN;
  }

  if (!DOUBLE_PATTERN.test(trimmed)) {
    return undefined;
  }

  const mantissa = trimmed.split(/[eE]/)[0];
  if (!/\d/.test(mantissa)) {
    return undefined;
  }

  return Number(trimmed.replace(/,/g, ''));
}

/**
 * ISO 8601 date or date-time: YYYY-MM-DD, optionally followed by
 * T or a space, HH:mm[:ss[.fff]] and Z or a ±HH:mm offset.
 * Date-only text is UTC midnight; a time without an offset is local time.
 */
export function parseDate(text: string | undefined): Date | undefined {
  if (text === undefined) {
    return undefined;
  }

  const match = ISO_DATE_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }

  const [, year, month, day, time] = match;
  // Reject calendar overflow such as 2024-02-30
  const calendarDay = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    calendarDay.getUTCFullYear() !== Number(year) ||
    calendarDay.getUTCMonth() !== Number(month) - 1 ||
    calendarDay.getUTCDate() !== Number(day)
  ) {
    return undefined;
  }

  const parsed = new Date(time ? `${year}-${month}-${day}T${time}` : `${year}-${month}-${day}`);
  return isNaN(parsed.getTime()) ? undefined : parsed;
}
