import { describe, expect, it } from "vitest";
import {
  createCanonicalDate,
  formatCanonicalDate,
  normalizeDate,
  parseAsOfDate,
  resolveMonthName,
  tryNormalizeDate,
} from "../core/dateNormalizer.js";
import { DateParseError } from "../core/errors.js";

function parseFailure(raw: string, options?: { referenceYear?: number }): DateParseError {
  try {
    normalizeDate(raw, options);
  } catch (error) {
    if (error instanceof DateParseError) return error;
    throw error;
  }
  throw new Error(`expected "${raw}" to be rejected`);
}

describe("normalizeDate", () => {
  it.each([
    ["15/08/1995"],
    ["15-08-1995"],
    ["15.08.1995"],
    ["15 08 1995"],
    ["1995-08-15"],
    ["1995/08/15"],
    ["15 Aug 1995"],
    ["15-AUG-1995"],
    ["15th August 1995"],
    ["Aug 15, 1995"],
    ["August 15 1995"],
  ])("parses %s as 1995-08-15", (raw) => {
    expect(normalizeDate(raw, { referenceYear: 2023 })).toEqual({ year: 1995, month: 8, day: 15 });
  });

  it("reads two numeric fields as day then month", () => {
    expect(normalizeDate("05/06/2000", { referenceYear: 2023 })).toEqual({ year: 2000, month: 6, day: 5 });
  });

  it("accepts single-digit day and month", () => {
    expect(normalizeDate("5/6/2000", { referenceYear: 2023 })).toEqual({ year: 2000, month: 6, day: 5 });
  });

  it("strips surrounding punctuation and whitespace", () => {
    expect(normalizeDate("  :15/08/1995. ", { referenceYear: 2023 })).toEqual({ year: 1995, month: 8, day: 15 });
  });

  it("resolves the abbreviation Sept", () => {
    expect(normalizeDate("5 Sept 2001", { referenceYear: 2023 })).toEqual({ year: 2001, month: 9, day: 5 });
  });

  it("rejects impossible calendar dates", () => {
    expect(parseFailure("31/02/1995", { referenceYear: 2023 }).reason).toBe("not a valid calendar date");
    expect(parseFailure("15/13/1995", { referenceYear: 2023 }).reason).toBe("not a valid calendar date");
  });

  it("accepts 29 February only in leap years", () => {
    expect(normalizeDate("29/02/2000", { referenceYear: 2023 })).toEqual({ year: 2000, month: 2, day: 29 });
    expect(parseFailure("29/02/1999", { referenceYear: 2023 }).reason).toBe("not a valid calendar date");
  });

  it("rejects years outside 1900 through the reference year", () => {
    expect(parseFailure("01/01/1899", { referenceYear: 2023 }).reason).toBe("year 1899 outside 1900-2023");
    expect(parseFailure("01/01/2024", { referenceYear: 2023 }).reason).toBe("year 2024 outside 1900-2023");
    expect(normalizeDate("01/01/1900", { referenceYear: 2023 })).toEqual({ year: 1900, month: 1, day: 1 });
  });

  it("reports unknown month names", () => {
    expect(parseFailure("Foo 15, 1995").reason).toBe("unknown month name");
  });

  it("reports unrecognised formats and empty input", () => {
    expect(parseFailure("hello").reason).toBe("unrecognised format");
    expect(parseFailure("1995").reason).toBe("unrecognised format");
    expect(parseFailure("   ").reason).toBe("empty input");
  });

  it("carries the DATE_PARSE_ERROR code and the raw input", () => {
    const error = parseFailure("not a date");
    expect(error.code).toBe("DATE_PARSE_ERROR");
    expect(error.input).toBe("not a date");
    expect(error.message).toBe('Cannot parse date "not a date": unrecognised format');
  });

  it("returns frozen dates", () => {
    expect(Object.isFrozen(normalizeDate("15/08/1995", { referenceYear: 2023 }))).toBe(true);
  });

  it("round-trips through the canonical string", () => {
    for (const raw of ["15/08/1995", "1 Jan 1990", "Dec 31, 1999", "2004-02-29"]) {
      const date = normalizeDate(raw, { referenceYear: 2023 });
      expect(normalizeDate(formatCanonicalDate(date), { referenceYear: 2023 })).toEqual(date);
    }
  });
});

describe("tryNormalizeDate", () => {
  it("returns null instead of throwing", () => {
    expect(tryNormalizeDate("garbage")).toBeNull();
    expect(tryNormalizeDate("15/08/1995", { referenceYear: 2023 })).toEqual({ year: 1995, month: 8, day: 15 });
  });
});

describe("resolveMonthName", () => {
  it("needs at least three letters", () => {
    expect(resolveMonthName("Au")).toBeNull();
    expect(resolveMonthName("aug")).toBe(8);
    expect(resolveMonthName("MAR")).toBe(3);
    expect(resolveMonthName("may")).toBe(5);
    expect(resolveMonthName("December")).toBe(12);
    expect(resolveMonthName("Augustus")).toBeNull();
  });
});

describe("createCanonicalDate", () => {
  it("validates the triple", () => {
    expect(createCanonicalDate(1995, 8, 15, { referenceYear: 2023 })).toEqual({ year: 1995, month: 8, day: 15 });
    expect(() => createCanonicalDate(1995, 4, 31, { referenceYear: 2023 })).toThrow(DateParseError);
  });
});

describe("formatCanonicalDate", () => {
  it("zero-pads month and day", () => {
    expect(formatCanonicalDate({ year: 2001, month: 2, day: 3 })).toBe("2001-02-03");
  });
});

describe("parseAsOfDate", () => {
  it("parses strict YYYY-MM-DD to local midnight", () => {
    const date = parseAsOfDate("2023-08-20");
    expect(date?.getFullYear()).toBe(2023);
    expect(date?.getMonth()).toBe(7);
    expect(date?.getDate()).toBe(20);
  });

  it("rejects other shapes and impossible days", () => {
    expect(parseAsOfDate("20-08-2023")).toBeNull();
    expect(parseAsOfDate("2023-8-20")).toBeNull();
    expect(parseAsOfDate("2023-02-30")).toBeNull();
  });
});
