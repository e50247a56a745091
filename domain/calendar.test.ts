import { describe, expect, it } from "vitest";
import {
  MAX_DATE_KEY,
  compareDateKeys,
  dateKey,
  epochDay,
  formatDateKey,
  nextDay,
  parseDateKey,
} from "./calendar.js";
import { AxisRangeError, ConfigurationError } from "./errors.js";

describe("dateKey", () => {
  it("accepts valid ISO dates", () => {
    expect(dateKey("2020-02-29")).toBe("2020-02-29");
    expect(dateKey("0050-06-01")).toBe("0050-06-01");
  });

  it("rejects malformed strings", () => {
    expect(() => dateKey("2020/01/01")).toThrow(ConfigurationError);
    expect(() => dateKey("20-01-01")).toThrow("Not an ISO date: 20-01-01");
  });

  it("rejects dates outside the calendar", () => {
    expect(() => dateKey("2021-02-29")).toThrow("Invalid calendar date: 2021-02-29");
    expect(() => dateKey("2020-13-01")).toThrow(ConfigurationError);
  });
});

describe("formatDateKey / parseDateKey", () => {
  it("pads every component", () => {
    expect(formatDateKey(5, 1, 2)).toBe("0005-01-02");
  });

  it("splits into numbers", () => {
    expect(parseDateKey(dateKey("2025-02-17"))).toEqual({ y: 2025, m: 2, d: 17 });
  });
});

describe("nextDay", () => {
  it("steps across month, year and leap boundaries", () => {
    expect(nextDay(dateKey("2020-01-31"))).toBe("2020-02-01");
    expect(nextDay(dateKey("2020-02-28"))).toBe("2020-02-29");
    expect(nextDay(dateKey("2021-02-28"))).toBe("2021-03-01");
    expect(nextDay(dateKey("2020-12-31"))).toBe("2021-01-01");
  });

  it("handles years below 100", () => {
    expect(nextDay(dateKey("0099-12-31"))).toBe("0100-01-01");
  });
});

describe("compareDateKeys", () => {
  it("orders chronologically", () => {
    expect(compareDateKeys(dateKey("2020-01-01"), dateKey("2020-01-02"))).toBe(-1);
    expect(compareDateKeys(dateKey("2020-01-02"), dateKey("2020-01-01"))).toBe(1);
    expect(compareDateKeys(dateKey("2020-01-01"), dateKey("2020-01-01"))).toBe(0);
  });
});

describe("date range", () => {
  it("steps up to the last representable date", () => {
    expect(nextDay(dateKey("9999-12-30"))).toBe(MAX_DATE_KEY);
  });

  it("refuses to step past 9999-12-31", () => {
    expect(() => nextDay(dateKey(MAX_DATE_KEY))).toThrow(AxisRangeError);
    expect(() => nextDay(dateKey(MAX_DATE_KEY))).toThrow("No point after 9999-12-31 on the date axis");
  });
});

describe("epochDay", () => {
  it("counts days from 1970-01-01", () => {
    expect(epochDay(dateKey("1970-01-01"))).toBe(0);
    expect(epochDay(dateKey("1970-01-02"))).toBe(1);
    expect(epochDay(dateKey("1969-12-31"))).toBe(-1);
    expect(epochDay(dateKey("2000-03-01")) - epochDay(dateKey("2000-02-28"))).toBe(2);
  });

  it("handles years below 100", () => {
    expect(epochDay(dateKey("0050-01-01")) - epochDay(dateKey("0049-01-01"))).toBe(365);
  });
});
