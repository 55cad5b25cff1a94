import moment from "moment-timezone";

// Appointment dates are calendar days with no zone attached
const DEFAULT_TIMEZONE = "UTC";

export const DATE_FORMAT = "YYYY-MM-DD";

const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

// Date validation

/**
 * True for a real calendar day written as YYYY-MM-DD. Strict parsing rejects
 * overflow such as `2025-02-30` and one-digit months or days.
 */
export const isValidCalendarDate = (value: string): boolean => {
  return moment.tz(value, DATE_FORMAT, true, DEFAULT_TIMEZONE).isValid();
};

/**
 * True for `HH:mm` or `HH:mm:ss` between 00:00:00 and 23:59:59.
 */
export const isValidTimeOfDay = (value: string): boolean => {
  return TIME_OF_DAY.test(value);
};

// Time utilities
export const normalizeTime = (value: string): string => {
  return value.length === 5 ? `${value}:00` : value;
};

// Date comparison
export const isDateBefore = (date: string, other: string): boolean => {
  const left = moment.tz(date, DATE_FORMAT, true, DEFAULT_TIMEZONE);
  const right = moment.tz(other, DATE_FORMAT, true, DEFAULT_TIMEZONE);
  return left.isBefore(right, "day");
};
