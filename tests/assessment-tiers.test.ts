import { describe, expect, it } from "vitest";
import { apportionTiers, tierLevels } from "@/lib/assessment-tiers";

describe("apportionTiers", () => {
  it.each([
    [8, { below: 3, at: 3, above: 2 }],
    [9, { below: 4, at: 3, above: 2 }],
    [10, { below: 4, at: 4, above: 2 }],
  ])("splits %i items 40/40/20", (total, expected) => {
    expect(apportionTiers(total)).toEqual(expected);
  });

  it("always sums to the total with non-negative counts", () => {
    for (let total = 0; total <= 25; total++) {
      const counts = apportionTiers(total);
      expect(counts.below + counts.at + counts.above).toBe(total);
      expect(Math.min(counts.below, counts.at, counts.above)).toBeGreaterThanOrEqual(0);
    }
  });

  it("rejects negative or fractional totals", () => {
    expect(() => apportionTiers(-1)).toThrow(RangeError);
    expect(() => apportionTiers(8.5)).toThrow(RangeError);
  });
});

describe("tierLevels", () => {
  it("brackets the student level", () => {
    expect(tierLevels(3)).toEqual({ below: 2, at: 3, above: 4 });
  });

  it("clamps at the ends of the scale", () => {
    expect(tierLevels(1)).toEqual({ below: 1, at: 1, above: 2 });
    expect(tierLevels(5)).toEqual({ below: 4, at: 5, above: 5 });
  });
});
