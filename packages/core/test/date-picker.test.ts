import { describe, expect, it } from "vitest";

import type { ParsedDate } from "../src/dates";
import {
  monthGrid,
  openPicker,
  pickerValue,
  selectDay,
  shiftDays,
  shiftMonths,
  shiftSeconds,
  shiftYears,
  toggleTime,
  weekdayHeader,
} from "../src/date-picker";

function day(year: number, month: number, d: number, hasTime = false): ParsedDate {
  return { year, month, day: d, hour: 0, minute: 0, second: 0, hasTime };
}

function days(week: { day: number }[] | undefined): number[] {
  return (week ?? []).map((cell) => cell.day);
}

describe("monthGrid", () => {
  it("pads a Sunday-first month with the neighbouring days", () => {
    const weeks = monthGrid(2030, 3, "SundayFirst");
    expect(weeks).toHaveLength(6);
    expect(days(weeks[0])).toEqual([24, 25, 26, 27, 28, 1, 2]);
    expect(weeks[0]?.map((c) => c.inMonth)).toEqual([false, false, false, false, false, true, true]);
    expect(days(weeks[5])).toEqual([31, 1, 2, 3, 4, 5, 6]);
  });

  it("starts the week on Monday when asked", () => {
    const weeks = monthGrid(2030, 3, "MondayFirst");
    expect(weeks).toHaveLength(5);
    expect(days(weeks[0])).toEqual([25, 26, 27, 28, 1, 2, 3]);
    expect(days(weeks[4])).toEqual([25, 26, 27, 28, 29, 30, 31]);
    expect(weekdayHeader("MondayFirst")).toEqual(["Mo", "Tu", "We", "Th", "Fr", "Sa", "Su"]);
    expect(weekdayHeader("SundayFirst")[0]).toBe("Su");
  });
});

describe("date arithmetic", () => {
  it("crosses month and year ends", () => {
    expect(shiftDays(day(2030, 1, 31), 7)).toEqual(day(2030, 2, 7));
    const late = { ...day(2030, 12, 31, true), hour: 23, minute: 59, second: 30 };
    expect(shiftSeconds(late, 60)).toEqual({ ...day(2031, 1, 1, true), second: 30 });
  });

  it("clamps the day when paging months and years", () => {
    expect(shiftMonths(day(2030, 1, 31), 1)).toEqual(day(2030, 2, 28));
    expect(shiftMonths(day(2030, 1, 15), -1)).toEqual(day(2029, 12, 15));
    expect(shiftYears(day(2028, 2, 29), 1)).toEqual(day(2029, 2, 28));
  });
});

describe("picker", () => {
  it("opens on the date in the field", () => {
    const picker = openPicker("CardDueDate", "05/03/2030-10:00:00", "DayMonthYearTime", new Date(2031, 0, 1));
    expect(picker.selected).toEqual({ ...day(2030, 3, 5, true), hour: 10 });
    expect(picker.timeOpen).toBe(true);
  });

  it("opens on today when the field is empty", () => {
    const picker = openPicker("NewCardDueDate", "", "DayMonthYear", new Date(2030, 2, 5, 10, 20, 30));
    expect(picker.selected).toEqual({ year: 2030, month: 3, day: 5, hour: 10, minute: 20, second: 30, hasTime: false });
    expect(picker.timeOpen).toBe(false);
    expect(pickerValue(picker, "DayMonthYear")).toBe("05/03/2030");
  });

  it("writes the time only while the time column is open", () => {
    const picker = openPicker("CardDueDate", "05/03/2030", "DayMonthYearTime", new Date(2031, 0, 1));
    expect(pickerValue(picker, "DayMonthYearTime")).toBe("05/03/2030");
    const timed = toggleTime(picker);
    expect(timed.timeOpen).toBe(true);
    expect(pickerValue(timed, "DayMonthYear")).toBe("05/03/2030-00:00:00");
  });

  it("ignores a day the month does not have", () => {
    const picker = openPicker("CardDueDate", "05/02/2030", "DayMonthYear", new Date(2031, 0, 1));
    expect(selectDay(picker, 30)).toBe(picker);
    expect(selectDay(picker, 28).selected.day).toBe(28);
  });
});
