import {
  daysInMonth,
  formatParsedDate,
  parseDateInput,
  withTime,
  withoutTime,
  type DateTimeFormat,
  type ParsedDate,
} from "./dates";

export type CalendarFormat = "SundayFirst" | "MondayFirst";

export const CALENDAR_FORMATS: readonly CalendarFormat[] = ["SundayFirst", "MondayFirst"];
export const DEFAULT_CALENDAR_FORMAT: CalendarFormat = "SundayFirst";

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

const WEEKDAYS = ["Su", "Mo", "Tu", "We", "Th", "Fr", "Sa"] as const;

export function isCalendarFormat(x: unknown): x is CalendarFormat {
  return typeof x === "string" && (CALENDAR_FORMATS as readonly string[]).includes(x);
}

export function toggleCalendarFormat(format: CalendarFormat): CalendarFormat {
  return format === "SundayFirst" ? "MondayFirst" : "SundayFirst";
}

/** The due-date field a picker writes back into. */
export type DueDateField = "CardDueDate" | "NewCardDueDate";

export interface DateTimePicker {
  field: DueDateField;
  /** `hasTime` decides whether the written value carries the time. */
  selected: ParsedDate;
  timeOpen: boolean;
}

export interface CalendarCell {
  day: number;
  inMonth: boolean;
}

function toUtc(d: ParsedDate): Date {
  const date = new Date(0);
  date.setUTCFullYear(d.year, d.month - 1, d.day);
  date.setUTCHours(d.hour, d.minute, d.second, 0);
  return date;
}

function fromUtc(date: Date, hasTime: boolean): ParsedDate {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    hasTime,
  };
}

export function shiftSeconds(d: ParsedDate, seconds: number): ParsedDate {
  const date = toUtc(d);
  date.setUTCSeconds(date.getUTCSeconds() + seconds);
  return fromUtc(date, d.hasTime);
}

export function shiftDays(d: ParsedDate, days: number): ParsedDate {
  return shiftSeconds(d, days * 86_400);
}

/** Moves by whole months; the day is clamped to the length of the target month. */
export function shiftMonths(d: ParsedDate, months: number): ParsedDate {
  const index = d.year * 12 + (d.month - 1) + months;
  const year = Math.floor(index / 12);
  const month = index - year * 12 + 1;
  return { ...d, year, month, day: Math.min(d.day, daysInMonth(year, month)) };
}

export function shiftYears(d: ParsedDate, years: number): ParsedDate {
  return shiftMonths(d, years * 12);
}

export function weekdayHeader(format: CalendarFormat): string[] {
  return format === "SundayFirst" ? [...WEEKDAYS] : [...WEEKDAYS.slice(1), WEEKDAYS[0]];
}

/**
 * Weeks of the month as rows of seven cells. Days of the neighbouring months
 * pad the first and last week.
 */
export function monthGrid(year: number, month: number, format: CalendarFormat): CalendarCell[][] {
  const weekday = toUtc({ year, month, day: 1, hour: 0, minute: 0, second: 0, hasTime: false }).getUTCDay();
  const offset = format === "SundayFirst" ? weekday : (weekday + 6) % 7;
  const previous = shiftMonths({ year, month, day: 1, hour: 0, minute: 0, second: 0, hasTime: false }, -1);
  const previousDays = daysInMonth(previous.year, previous.month);

  const cells: CalendarCell[] = [];
  for (let i = 0; i < offset; i++) cells.push({ day: previousDays - offset + 1 + i, inMonth: false });
  const days = daysInMonth(year, month);
  for (let day = 1; day <= days; day++) cells.push({ day, inMonth: true });
  for (let day = 1; cells.length % 7 !== 0; day++) cells.push({ day, inMonth: false });

  const weeks: CalendarCell[][] = [];
  for (let i = 0; i < cells.length; i += 7) weeks.push(cells.slice(i, i + 7));
  return weeks;
}

function fromLocal(now: Date, hasTime: boolean): ParsedDate {
  return {
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
    hour: now.getHours(),
    minute: now.getMinutes(),
    second: now.getSeconds(),
    hasTime,
  };
}

/**
 * Starts on the date already in the field, or on `now` when it holds none.
 * The time column starts open when the value carries a time.
 */
export function openPicker(field: DueDateField, raw: string, format: DateTimeFormat, now: Date): DateTimePicker {
  const parsed = parseDateInput(raw, format);
  const selected = parsed ?? fromLocal(now, withTime(format) === format);
  return { field, selected, timeOpen: selected.hasTime };
}

export function toggleTime(picker: DateTimePicker): DateTimePicker {
  const timeOpen = !picker.timeOpen;
  return { ...picker, timeOpen, selected: { ...picker.selected, hasTime: timeOpen } };
}

export function selectDay(picker: DateTimePicker, day: number): DateTimePicker {
  const { year, month } = picker.selected;
  if (day < 1 || day > daysInMonth(year, month)) return picker;
  return { ...picker, selected: { ...picker.selected, day } };
}

export function pickerValue(picker: DateTimePicker, format: DateTimeFormat): string {
  const target = picker.selected.hasTime ? withTime(format) : withoutTime(format);
  return formatParsedDate(picker.selected, target);
}
