import { describe, it, expect } from "vitest";
import { lineCents, roundHalfUp, toCents } from "@/lib/analytics/money";

describe("roundHalfUp", () => {
  it("rounds halves away from zero", () => {
    expect(roundHalfUp(1.005)).toBe(1.01);
    expect(roundHalfUp(2.675)).toBe(2.68);
    expect(roundHalfUp(-1.005)).toBe(-1.01);
    expect(roundHalfUp(66.66666)).toBe(66.67);
  });

  it("never returns negative zero", () => {
    expect(Object.is(roundHalfUp(-0.001), 0)).toBe(true);
  });
});

describe("cents", () => {
  it("converts prices without binary drift", () => {
    expect(toCents(0.29)).toBe(29);
    expect(toCents(2.55)).toBe(255);
    expect(lineCents(6, 2.55)).toBe(1530);
  });
});
