const DAY_MS = 86_400_000;
const DAYS_PER_YEAR = 365.25;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:$|T)/;

export interface ExperienceDates {
  start_date: string;
  end_date: string;
}

export interface ExperienceDurationWarning {
  index: number;
  reason: "missing_start_date" | "invalid_start_date" | "invalid_end_date" | "negative_duration";
  start_date: string;
  end_date: string;
}

/**
 * Parses a `YYYY-MM-DD` (optionally followed by a time part) into a UTC-midnight timestamp.
 * Calendar-invalid dates such as 2023-02-30 return null.
 */
export function parseCalendarDate(value: string): number | null {
  const match = value.trim().match(ISO_DATE_PATTERN);
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const timestamp = Date.UTC(year, month - 1, day);
  const check = new Date(timestamp);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }
  return timestamp;
}

export function utcToday(now: Date): number {
  return Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
}

export function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

export function calculateTotalExperienceYears(
  entries: ExperienceDates[],
  now: Date,
  onWarning?: (warning: ExperienceDurationWarning) => void,
): number {
  const today = utcToday(now);
  let total = 0;

  entries.forEach((entry, index) => {
    const warn = (reason: ExperienceDurationWarning["reason"]): void => {
      onWarning?.({ index, reason, start_date: entry.start_date, end_date: entry.end_date });
    };

    if (!entry.start_date.trim()) {
      warn("missing_start_date");
      return;
    }
    const start = parseCalendarDate(entry.start_date);
    if (start === null) {
      warn("invalid_start_date");
      return;
    }

    let end = today;
    if (entry.end_date.trim()) {
      const parsedEnd = parseCalendarDate(entry.end_date);
      if (parsedEnd === null) {
        warn("invalid_end_date");
        return;
      }
      end = parsedEnd;
    }

    const days = Math.floor((end - start) / DAY_MS);
    if (days < 0) {
      warn("negative_duration");
      return;
    }
    total += days / DAYS_PER_YEAR;
  });

  return roundToTenth(total);
}
