import { addDays, differenceInCalendarDays, eachDayOfInterval, format, isValid, isWeekend, parse, parseISO } from "date-fns";
import type { IsoDate } from "./types";

const ISO_FORMAT = "yyyy-MM-dd";
const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const BR_PATTERN = /^\d{2}\/\d{2}\/\d{4}$/;

export function toIsoDate(date: Date): IsoDate {
  return format(date, ISO_FORMAT);
}

export function isIsoDate(text: string): boolean {
  return ISO_PATTERN.test(text) && isValid(parseISO(text));
}

/**
 * Accepts "YYYY-MM-DD", "YYYY-MM-DD HH:mm:ss" and the Brazilian "DD/MM/YYYY".
 */
export function parseFlexibleDate(text: string): IsoDate | null {
  const trimmed = text.trim();
  const head = trimmed.slice(0, 10);
  if (ISO_PATTERN.test(head)) {
    return isValid(parseISO(head)) ? head : null;
  }
  if (BR_PATTERN.test(trimmed)) {
    const parsed = parse(trimmed, "dd/MM/yyyy", new Date());
    return isValid(parsed) ? toIsoDate(parsed) : null;
  }
  return null;
}

export function shiftDays(date: IsoDate, days: number): IsoDate {
  return toIsoDate(addDays(parseISO(date), days));
}

/** Calendar days from `start` to `end` (negative when end is earlier). */
export function daysBetween(start: IsoDate, end: IsoDate): number {
  return differenceInCalendarDays(parseISO(end), parseISO(start));
}

export function minDate(a: IsoDate, b: IsoDate): IsoDate {
  return a <= b ? a : b;
}

/** Monday-to-Friday dates in [start, end]. */
export function weekdaysBetween(start: IsoDate, end: IsoDate): IsoDate[] {
  if (end < start) return [];
  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) })
    .filter(day => !isWeekend(day))
    .map(toIsoDate);
}

export function monthKey(date: IsoDate): string {
  return date.slice(0, 7);
}

/** "DD/MM/YYYY", the format BCB endpoints take. */
export function toBrDate(date: IsoDate): string {
  return format(parseISO(date), "dd/MM/yyyy");
}

export function today(): IsoDate {
  return toIsoDate(new Date());
}
