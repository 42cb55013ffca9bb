import { describe, it, expect } from "vitest";
import { maintainabilityIndex } from "./maintainability.js";

describe("maintainabilityIndex", () => {
  it("applies the rescaled formula", () => {
    // (171 - 5.2 ln 100 - 0.23 * 2 - 16.2 ln 10) * 100 / 171
    expect(maintainabilityIndex(100, 2, 10)).toBeCloseTo(63.913, 3);
  });

  it("drops as complexity grows", () => {
    expect(maintainabilityIndex(100, 20, 10)).toBeLessThan(maintainabilityIndex(100, 2, 10));
  });

  it("is 100 when there is no volume or no source line", () => {
    expect(maintainabilityIndex(0, 0, 0)).toBe(100);
    expect(maintainabilityIndex(0, 1, 12)).toBe(100);
    expect(maintainabilityIndex(50, 1, 0)).toBe(100);
  });

  it("is clamped to the 0..100 range", () => {
    expect(maintainabilityIndex(1e9, 400, 1e6)).toBe(0);
    expect(maintainabilityIndex(0.5, 0, 1)).toBe(100);
  });
});
