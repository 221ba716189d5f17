export const SENTINEL_DATE = '9999-12-31';

const usDateRegex = /^(\d{2})\/(\d{2})\/(\d{4})$/;

/**
 * Converts an `MM/DD/YYYY` string into `YYYY-MM-DD`.
 * Returns null when the shape is wrong or the day does not exist on the calendar.
 */
export const usDateToIso = (value: string | null | undefined): string | null => {
  if (!value) {
    return null;
  }
  const match = usDateRegex.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, mm, dd, yyyy] = match;
  const month = Number(mm);
  const day = Number(dd);
  const year = Number(yyyy);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${yyyy}-${mm}-${dd}`;
};
