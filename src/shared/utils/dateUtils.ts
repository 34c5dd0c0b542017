const isoDatePattern = /^(\d{4})-(\d{2})-(\d{2})$/;
const msPerDay = 24 * 60 * 60 * 1000;

/**
 * Parses a `YYYY-MM-DD` calendar date as UTC midnight; rejects rollovers such as `2024-02-30`.
 */
export const parseIsoDate = (value: string): Date | null => {
  const match = isoDatePattern.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day] = match;
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }

  return toIsoDate(parsed) === value.trim() ? parsed : null;
};

export const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);

export const daysBetween = (start: Date, end: Date): number =>
  Math.round((end.getTime() - start.getTime()) / msPerDay);

/**
 * Calendar year of an ISO date string.
 */
export const calendarYear = (isoDate: string): number =>
  Number(isoDate.slice(0, 4));
