import { describe, expect, it } from "vitest";
import { daysSinceJ2000, toJulianDay, toMillis } from "../time.js";
import { InvalidInputError } from "../errors.js";

const J2000_NOON = Date.UTC(2000, 0, 1, 12);

describe("toJulianDay", () => {
  it("maps the J2000 epoch to 2451545", () => {
    expect(toJulianDay(J2000_NOON)).toBe(2451545);
  });

  it("maps the Unix epoch to 2440587.5", () => {
    expect(toJulianDay(0)).toBe(2440587.5);
  });

  it("accepts a Date and its millisecond value alike", () => {
    const date = new Date(Date.UTC(2025, 1, 11, 11, 25, 18));
    expect(toJulianDay(date)).toBe(toJulianDay(date.getTime()));
  });

  it.each([NaN, Infinity, -Infinity])("rejects %s", (value) => {
    expect(() => toJulianDay(value)).toThrow(InvalidInputError);
  });

  it("rejects an invalid Date", () => {
    expect(() => toJulianDay(new Date("not a date"))).toThrow(InvalidInputError);
  });
});

describe("daysSinceJ2000", () => {
  it("is zero at the epoch", () => {
    expect(daysSinceJ2000(new Date(J2000_NOON))).toBe(0);
  });

  it("counts fractional days", () => {
    expect(daysSinceJ2000(Date.UTC(2025, 1, 11, 11, 25, 18))).toBeCloseTo(9172.97590277763, 9);
    expect(daysSinceJ2000(J2000_NOON - 6 * 60 * 60 * 1000)).toBe(-0.25);
  });
});

describe("toMillis", () => {
  it("reports the instant field on failure", () => {
    try {
      toMillis(NaN);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      expect(err).toMatchObject({ name: "InvalidInputError", field: "instant" });
    }
  });
});
