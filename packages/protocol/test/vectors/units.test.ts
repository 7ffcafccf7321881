import { describe, it, expect } from "vitest";
import { formatUnits, parseUnits } from "../../src/units.js";

describe("formatUnits", () => {
  it("formats whole and fractional amounts", () => {
    expect(formatUnits(0)).toBe("0");
    expect(formatUnits(1)).toBe("0.000001");
    expect(formatUnits(1_500_000)).toBe("1.5");
    expect(formatUnits(10_000_000_000)).toBe("10000");
  });

  it("rejects negative and fractional base units", () => {
    expect(() => formatUnits(-1)).toThrow("Invalid base-unit amount");
    expect(() => formatUnits(1.5)).toThrow("Invalid base-unit amount");
  });
});

describe("parseUnits", () => {
  it("parses decimal strings into base units", () => {
    expect(parseUnits("100")).toBe(100_000_000);
    expect(parseUnits("0.5")).toBe(500_000);
    expect(parseUnits(" 2.000001 ")).toBe(2_000_001);
  });

  it("rejects excess precision and junk", () => {
    expect(() => parseUnits("1.0000001")).toThrow("more than 6 decimals");
    expect(() => parseUnits("-1")).toThrow("Invalid amount: -1");
    expect(() => parseUnits("abc")).toThrow("Invalid amount: abc");
  });
});
