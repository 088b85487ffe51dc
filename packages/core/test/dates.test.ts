import { describe, expect, it } from "vitest";

import { convertDueDate, dueDateState, formatFromHumanReadable, normalizeDueDate } from "../src/dates";

describe("normalizeDueDate", () => {
  it("reads day-first input in the configured format", () => {
    expect(normalizeDueDate("15-03-2030", "DayMonthYearTime")).toEqual({ ok: true, value: "15/03/2030" });
  });

  it("keeps the time when one is given", () => {
    expect(normalizeDueDate("2030-03-15 10:30", "DayMonthYear")).toEqual({ ok: true, value: "15/03/2030-10:30:00" });
  });

  it("falls back to the other order when the preferred one is invalid", () => {
    expect(normalizeDueDate("03/15/2030", "DayMonthYear")).toEqual({ ok: true, value: "15/03/2030" });
  });

  it("treats empty input and the sentinel as unset", () => {
    expect(normalizeDueDate("  ", "DayMonthYear")).toEqual({ ok: true, value: "Not Set" });
    expect(normalizeDueDate("Not Set", "DayMonthYear")).toEqual({ ok: true, value: "Not Set" });
  });

  it("rejects impossible dates", () => {
    expect(normalizeDueDate("31/02/2030", "DayMonthYear")).toEqual({ ok: false, input: "31/02/2030" });
    expect(normalizeDueDate("tomorrow", "DayMonthYear")).toEqual({ ok: false, input: "tomorrow" });
  });
});

describe("date formats", () => {
  it("converts stored dates between formats", () => {
    expect(convertDueDate("01/02/2030", "MonthDayYear", "YearMonthDay")).toBe("2030/01/02");
    expect(convertDueDate("Not Set", "MonthDayYear", "YearMonthDay")).toBe("Not Set");
  });

  it("maps human readable labels back to formats", () => {
    expect(formatFromHumanReadable("MM/DD/YYYY")).toBe("MonthDayYear");
    expect(formatFromHumanReadable("DD-MM-YYYY")).toBeUndefined();
  });
});

describe("dueDateState", () => {
  const now = new Date(2030, 2, 10, 12, 0, 0);
  const state = (dueDate: string) => dueDateState({ dueDate, format: "DayMonthYear", warningDelta: 3, now });

  it("classifies due dates against the warning window", () => {
    expect(state("Not Set")).toBe("unset");
    expect(state("15/03/2030")).toBe("default");
    expect(state("12/03/2030")).toBe("warning");
    expect(state("09/03/2030")).toBe("overdue");
  });
});
