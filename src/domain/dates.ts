import { addDays, differenceInCalendarDays, format, isValid, parseISO } from "date-fns";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True for calendar dates written as YYYY-MM-DD ("2024-02-30" is rejected).
 */
export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && isValid(parseISO(value));
}

export function toIsoDate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function todayIso(): string {
  return toIsoDate(new Date());
}

export function addDaysIso(isoDate: string, days: number): string {
  return toIsoDate(addDays(parseISO(isoDate), days));
}

/**
 * Whole days from `from` to `to` (negative when `to` lies before `from`)
 */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}
