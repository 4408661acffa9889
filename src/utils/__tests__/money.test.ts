import { describe, it, expect } from "vitest";
import { ValidationError } from "../errors.js";
import {
  addDecimals,
  compareAmounts,
  formatCents,
  formatDecimal,
  isCentPrecise,
  multiplyDecimals,
  parseDecimal,
  roundMoney,
  toCents,
} from "../money.js";

describe("parseDecimal()", () => {
  it("keeps the written digits", () => {
    expect(parseDecimal("1.50")).toEqual({ units: 150n, scale: 2 });
    expect(parseDecimal(-0.25)).toEqual({ units: -25n, scale: 2 });
  });

  it("expands exponent notation", () => {
    expect(parseDecimal(1e21)).toEqual({ units: 10n ** 21n, scale: 0 });
    expect(parseDecimal("1.5e-3")).toEqual({ units: 15n, scale: 4 });
  });

  it("rejects non-numbers", () => {
    expect(() => parseDecimal("12abc")).toThrow(ValidationError);
    expect(() => parseDecimal(Number.NaN)).toThrow(ValidationError);
  });
});

describe("exact arithmetic", () => {
  it("adds without binary drift", () => {
    expect(formatDecimal(addDecimals(parseDecimal("0.1"), parseDecimal("0.2")))).toBe("0.3");
  });

  it("multiplies scales together", () => {
    expect(multiplyDecimals(parseDecimal("1.1"), parseDecimal("1.2"))).toEqual({ units: 132n, scale: 2 });
  });

  it("rounds half up, away from zero", () => {
    expect(toCents({ units: 12345n, scale: 3 })).toBe(1235n);
    expect(toCents({ units: -12345n, scale: 3 })).toBe(-1235n);
    expect(toCents({ units: 12344n, scale: 3 })).toBe(1234n);
    expect(roundMoney(2.675)).toBe(2.68);
  });

  it("formats cents", () => {
    expect(formatCents(123456n)).toBe("1234.56");
    expect(formatCents(-5n)).toBe("-0.05");
  });
});

describe("amount checks", () => {
  it("detects sub-cent amounts", () => {
    expect(isCentPrecise(10.25)).toBe(true);
    expect(isCentPrecise(10.255)).toBe(false);
    expect(isCentPrecise(0.1 + 0.2)).toBe(false);
  });

  it("compares at cent precision", () => {
    expect(compareAmounts(10.1, 10.1)).toBe(0);
    expect(compareAmounts(10.1, 10.11)).toBe(-1);
    expect(compareAmounts(50000, 49999.99)).toBe(1);
  });
});
