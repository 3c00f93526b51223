export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const isISODate = (value: string): boolean => {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && formatISODate(parsed) === value;
};

export const parseISODate = (value: string): Date => {
  if (!isISODate(value)) {
    throw new Error(`Invalid ISO date: ${value}`);
  }
  return new Date(`${value}T00:00:00Z`);
};

const WEEKEND_DAYS = new Set([
  0, // SUNDAY
  6 // SATURDAY
]);

export const isWeekend = (date: string): boolean => WEEKEND_DAYS.has(parseISODate(date).getUTCDay());

// Skips Saturdays and Sundays; exchange holidays are not modelled.
export const addTradingDays = (date: string, days: number): string => {
  const cursor = parseISODate(date);
  let remaining = days;
  while (remaining > 0) {
    cursor.setUTCDate(cursor.getUTCDate() + 1);
    if (!WEEKEND_DAYS.has(cursor.getUTCDay())) remaining--;
  }
  return formatISODate(cursor);
};

// Trading days in (from, to]; zero when `to` is not after `from`.
export const tradingDaysBetween = (from: string, to: string): number => {
  const cursor = parseISODate(from);
  const end = parseISODate(to);
  let count = 0;
  while (cursor < end) {
    cursor.setUTCDate(cursor.getUTCDate() + 1);
    if (!WEEKEND_DAYS.has(cursor.getUTCDay())) count++;
  }
  return count;
};
