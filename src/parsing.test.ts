import { describe, expect, test } from "vitest";
import {
  ageBracket,
  computeAge,
  daysBetween,
  parseCode,
  parseDate,
} from "./parsing";

describe("code parsing", () => {
  test("accepts integers and integer strings", () => {
    expect(parseCode(1)).toBe(1);
    expect(parseCode("2")).toBe(2);
    expect(parseCode(" 9 ")).toBe(9);
  });

  test("rejects blanks and non-integers", () => {
    expect(parseCode(null)).toBeNull();
    expect(parseCode(undefined)).toBeNull();
    expect(parseCode("")).toBeNull();
    expect(parseCode("1.5")).toBeNull();
    expect(parseCode(1.5)).toBeNull();
    expect(parseCode("N/A")).toBeNull();
  });
});

describe("date parsing", () => {
  test("parses ISO strings to UTC midnight", () => {
    expect(parseDate("2021-03-10")?.toISOString()).toBe(
      "2021-03-10T00:00:00.000Z"
    );
    expect(parseDate("2021-03-10T14:22:00")?.toISOString()).toBe(
      "2021-03-10T00:00:00.000Z"
    );
  });

  test("parses day-first strings", () => {
    expect(parseDate("10/03/2021")?.toISOString()).toBe(
      "2021-03-10T00:00:00.000Z"
    );
  });

  test("keeps the calendar day of Date objects", () => {
    expect(parseDate(new Date(2021, 2, 10, 15, 30))?.toISOString()).toBe(
      "2021-03-10T00:00:00.000Z"
    );
  });

  test("parses spreadsheet serial numbers", () => {
    expect(parseDate(44265)?.toISOString()).toBe("2021-03-10T00:00:00.000Z");
  });

  test("unparseable values become null", () => {
    expect(parseDate("not a date")).toBeNull();
    expect(parseDate("")).toBeNull();
    expect(parseDate(null)).toBeNull();
    expect(parseDate(new Date(Number.NaN))).toBeNull();
  });
});

describe("age", () => {
  test("counts whole days between dates", () => {
    const from = parseDate("2011-03-11");
    const to = parseDate("2021-03-10");
    expect(from && to ? daysBetween(from, to) : null).toBe(3652);
  });

  test("one day short of the tenth birthday is still 9", () => {
    expect(computeAge(parseDate("2011-03-11"), parseDate("2021-03-10"))).toBe(9);
  });

  test("exact multiples of 365.25 days", () => {
    expect(computeAge(parseDate("2000-01-01"), parseDate("2020-01-01"))).toBe(20);
  });

  test("missing dates give no age", () => {
    expect(computeAge(null, parseDate("2021-03-10"))).toBeNull();
    expect(computeAge(parseDate("2011-03-11"), null)).toBeNull();
  });

  test("birth after notification gives a negative age", () => {
    expect(computeAge(parseDate("2022-01-01"), parseDate("2021-01-01"))).toBe(-1);
  });
});

describe("age brackets", () => {
  test("right-closed boundaries", () => {
    expect(ageBracket(0)).toBe("Child (0-9)");
    expect(ageBracket(9)).toBe("Child (0-9)");
    expect(ageBracket(10)).toBe("Adolescent (10-19)");
    expect(ageBracket(19)).toBe("Adolescent (10-19)");
    expect(ageBracket(20)).toBe("Young adult (20-24)");
    expect(ageBracket(24)).toBe("Young adult (20-24)");
    expect(ageBracket(25)).toBe("Adult (25-59)");
    expect(ageBracket(59)).toBe("Adult (25-59)");
    expect(ageBracket(60)).toBe("Elderly (60+)");
    expect(ageBracket(120)).toBe("Elderly (60+)");
  });

  test("no bracket outside [0, 120]", () => {
    expect(ageBracket(121)).toBeNull();
    expect(ageBracket(-1)).toBeNull();
    expect(ageBracket(null)).toBeNull();
    expect(ageBracket(Number.NaN)).toBeNull();
  });
});
