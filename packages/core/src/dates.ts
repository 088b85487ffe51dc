import { FIELD_NOT_SET } from "./model";

export type DateTimeFormat =
  | "DayMonthYear"
  | "DayMonthYearTime"
  | "MonthDayYear"
  | "MonthDayYearTime"
  | "YearMonthDay"
  | "YearMonthDayTime";

export const DATE_TIME_FORMATS: readonly DateTimeFormat[] = [
  "DayMonthYear",
  "DayMonthYearTime",
  "MonthDayYear",
  "MonthDayYearTime",
  "YearMonthDay",
  "YearMonthDayTime",
];

export const DEFAULT_DATE_TIME_FORMAT: DateTimeFormat = "DayMonthYearTime";

const HUMAN_READABLE: Record<DateTimeFormat, string> = {
  DayMonthYear: "DD/MM/YYYY",
  DayMonthYearTime: "DD/MM/YYYY-HH:MM:SS",
  MonthDayYear: "MM/DD/YYYY",
  MonthDayYearTime: "MM/DD/YYYY-HH:MM:SS",
  YearMonthDay: "YYYY/MM/DD",
  YearMonthDayTime: "YYYY/MM/DD-HH:MM:SS",
};

export function isDateTimeFormat(x: unknown): x is DateTimeFormat {
  return typeof x === "string" && (DATE_TIME_FORMATS as readonly string[]).includes(x);
}

export function humanReadableFormat(format: DateTimeFormat): string {
  return HUMAN_READABLE[format];
}

export function formatFromHumanReadable(raw: string): DateTimeFormat | undefined {
  return DATE_TIME_FORMATS.find((f) => HUMAN_READABLE[f] === raw);
}

export function formatHasTime(format: DateTimeFormat): boolean {
  return format.endsWith("Time");
}

export function withTime(format: DateTimeFormat): DateTimeFormat {
  switch (format) {
    case "DayMonthYear":
      return "DayMonthYearTime";
    case "MonthDayYear":
      return "MonthDayYearTime";
    case "YearMonthDay":
      return "YearMonthDayTime";
    default:
      return format;
  }
}

export function withoutTime(format: DateTimeFormat): DateTimeFormat {
  switch (format) {
    case "DayMonthYearTime":
      return "DayMonthYear";
    case "MonthDayYearTime":
      return "MonthDayYear";
    case "YearMonthDayTime":
      return "YearMonthDay";
    default:
      return format;
  }
}

export interface ParsedDate {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  hasTime: boolean;
}

const YEAR_FIRST = /^(\d{4})[/.-](\d{1,2})[/.-](\d{1,2})(?:[ T-](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const YEAR_LAST = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})(?:[ T-](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const ISO_WITH_ZONE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/;

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function validated(d: ParsedDate): ParsedDate | undefined {
  if (d.month < 1 || d.month > 12) return undefined;
  if (d.day < 1 || d.day > daysInMonth(d.year, d.month)) return undefined;
  if (d.hour > 23 || d.minute > 59 || d.second > 59) return undefined;
  return d;
}

function timeParts(h?: string, m?: string, s?: string): Pick<ParsedDate, "hour" | "minute" | "second" | "hasTime"> {
  if (h === undefined || m === undefined) return { hour: 0, minute: 0, second: 0, hasTime: false };
  return {
    hour: Number.parseInt(h, 10),
    minute: Number.parseInt(m, 10),
    second: s === undefined ? 0 : Number.parseInt(s, 10),
    hasTime: true,
  };
}

/**
 * Accepts `/`, `-` or `.` separated dates in year-first or year-last order,
 * an optional time part, and ISO 8601 with a zone. Year-last input is read
 * month-first only when `preferred` is a MonthDayYear format, falling back to
 * the other order when the preferred one is not a valid date.
 */
export function parseDateInput(raw: string, preferred: DateTimeFormat = DEFAULT_DATE_TIME_FORMAT): ParsedDate | undefined {
  const input = raw.trim();
  if (!input) return undefined;

  if (ISO_WITH_ZONE.test(input)) {
    const ms = Date.parse(input);
    if (Number.isNaN(ms)) return undefined;
    const d = new Date(ms);
    return {
      year: d.getFullYear(),
      month: d.getMonth() + 1,
      day: d.getDate(),
      hour: d.getHours(),
      minute: d.getMinutes(),
      second: d.getSeconds(),
      hasTime: true,
    };
  }

  const yf = YEAR_FIRST.exec(input);
  if (yf) {
    return validated({
      year: Number.parseInt(yf[1], 10),
      month: Number.parseInt(yf[2], 10),
      day: Number.parseInt(yf[3], 10),
      ...timeParts(yf[4], yf[5], yf[6]),
    });
  }

  const yl = YEAR_LAST.exec(input);
  if (!yl) return undefined;
  const a = Number.parseInt(yl[1], 10);
  const b = Number.parseInt(yl[2], 10);
  const year = Number.parseInt(yl[3], 10);
  const time = timeParts(yl[4], yl[5], yl[6]);
  const monthFirst = preferred === "MonthDayYear" || preferred === "MonthDayYearTime";
  const first = monthFirst ? { month: a, day: b } : { month: b, day: a };
  const second = monthFirst ? { month: b, day: a } : { month: a, day: b };
  return validated({ year, ...first, ...time }) ?? validated({ year, ...second, ...time });
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatParsedDate(d: ParsedDate, format: DateTimeFormat): string {
  const yyyy = pad(d.year, 4);
  const mm = pad(d.month);
  const dd = pad(d.day);
  const time = `${pad(d.hour)}:${pad(d.minute)}:${pad(d.second)}`;
  switch (format) {
    case "DayMonthYear":
      return `${dd}/${mm}/${yyyy}`;
    case "DayMonthYearTime":
      return `${dd}/${mm}/${yyyy}-${time}`;
    case "MonthDayYear":
      return `${mm}/${dd}/${yyyy}`;
    case "MonthDayYearTime":
      return `${mm}/${dd}/${yyyy}-${time}`;
    case "YearMonthDay":
      return `${yyyy}/${mm}/${dd}`;
    case "YearMonthDayTime":
      return `${yyyy}/${mm}/${dd}-${time}`;
  }
}

export function formatDate(date: Date, format: DateTimeFormat): string {
  return formatParsedDate(
    {
      year: date.getFullYear(),
      month: date.getMonth() + 1,
      day: date.getDate(),
      hour: date.getHours(),
      minute: date.getMinutes(),
      second: date.getSeconds(),
      hasTime: true,
    },
    format,
  );
}

export type DueDateResult = { ok: true; value: string } | { ok: false; input: string };

/** Empty input and the unset sentinel both mean "no due date". */
export function normalizeDueDate(raw: string, format: DateTimeFormat): DueDateResult {
  const input = raw.trim();
  if (!input || input === FIELD_NOT_SET) return { ok: true, value: FIELD_NOT_SET };
  const parsed = parseDateInput(input, format);
  if (!parsed) return { ok: false, input };
  const target = parsed.hasTime ? withTime(format) : withoutTime(format);
  return { ok: true, value: formatParsedDate(parsed, target) };
}

/** Reformats a stored due date after the configured format changes. */
export function convertDueDate(stored: string, from: DateTimeFormat, to: DateTimeFormat): string {
  if (stored === FIELD_NOT_SET) return stored;
  const parsed = parseDateInput(stored, from);
  if (!parsed) return stored;
  return formatParsedDate(parsed, parsed.hasTime ? withTime(to) : withoutTime(to));
}

export function invalidDateMessage(input: string): string {
  const formats = DATE_TIME_FORMATS.map(humanReadableFormat).join(", ");
  return `Invalid date format '${input}'. Please use any of the following ${formats}. Date has been reset and other changes have been saved.`;
}

export type DueState = "unset" | "default" | "warning" | "overdue";

export function dueDateState(args: {
  dueDate: string;
  format: DateTimeFormat;
  warningDelta: number;
  now?: Date;
}): DueState {
  if (args.dueDate === FIELD_NOT_SET) return "unset";
  const parsed = parseDateInput(args.dueDate, args.format);
  if (!parsed) return "unset";
  const due = parsed.hasTime
    ? new Date(parsed.year, parsed.month - 1, parsed.day, parsed.hour, parsed.minute, parsed.second)
    : new Date(parsed.year, parsed.month - 1, parsed.day, 23, 59, 59);
  const now = args.now ?? new Date();
  const diff = due.getTime() - now.getTime();
  if (diff < 0) return "overdue";
  if (diff <= args.warningDelta * 24 * 60 * 60 * 1000) return "warning";
  return "default";
}
