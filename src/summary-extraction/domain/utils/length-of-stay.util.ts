const MS_PER_DAY = 86_400_000;

// YYYY-MM-DD, optionally followed by a time and a UTC offset
const ISO_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,6})?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse an ISO-8601 date or datetime.
 *
 * Date-only values and datetimes without an offset are read as UTC.
 * Returns null for anything that is not a real calendar date
 * (e.g. "2025-02-30", "not-a-date").
 */
export function parseIsoDate(value: string): Date | null {
  const trimmed = value.trim();
  const match = ISO_DATE_PATTERN.exec(trimmed);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const calendarDate = new Date(Date.UTC(year, month - 1, day));
  if (
    calendarDate.getUTCFullYear() !== year ||
    calendarDate.getUTCMonth() !== month - 1 ||
    calendarDate.getUTCDate() !== day
  ) {
    return null;
  }

  if (match[4] === undefined) {
    return calendarDate;
  }

  const hours = Number(match[4]);
  const minutes = Number(match[5]);
  const seconds = match[6] === undefined ? 0 : Number(match[6]);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  const offset = match[7];
  const base = trimmed.slice(0, trimmed.length - (offset ?? '').length);
  const zone =
    offset === undefined
      ? 'Z'
      : offset.length === 5
        ? `${offset.slice(0, 3)}:${offset.slice(3)}`
        : offset;
  const parsed = new Date(`${base.replace(' ', 'T')}${zone}`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export type LengthOfStayResult =
  | { valid: true; days: number }
  | { valid: false; reason: string };

/**
 * Whole days between admission and discharge.
 * Same-day discharge is 0; a discharge before admission is invalid.
 */
export function calculateLengthOfStay(
  admissionDate: string,
  dischargeDate: string,
): LengthOfStayResult {
  const admittedAt = parseIsoDate(admissionDate);
  if (!admittedAt) {
    return { valid: false, reason: 'malformed admission_date' };
  }

  const dischargedAt = parseIsoDate(dischargeDate);
  if (!dischargedAt) {
    return { valid: false, reason: 'malformed discharge_date' };
  }

  const diffMs = dischargedAt.getTime() - admittedAt.getTime();
  if (diffMs < 0) {
    return { valid: false, reason: 'discharge_date precedes admission_date' };
  }

  return { valid: true, days: Math.floor(diffMs / MS_PER_DAY) };
}
