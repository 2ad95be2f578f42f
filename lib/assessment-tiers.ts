import type { DifficultyTier, MasteryLevel } from "@/types/engine";
import { clampLevel } from "./level-engine";

export const DIFFICULTY_TIERS: readonly DifficultyTier[] = ["below", "at", "above"];

/** Percent of the set per tier. */
export const TIER_SHARES: Record<DifficultyTier, number> = { below: 40, at: 40, above: 20 };

export const MIN_ITEMS = 8;
export const MAX_ITEMS = 10;

export type TierCounts = Record<DifficultyTier, number>;

/**
 * Largest-remainder apportionment of the 40/40/20 split. Integer arithmetic in
 * hundredths; remainder ties go to the earlier tier.
 */
export function apportionTiers(total: number): TierCounts {
  if (!Number.isInteger(total) || total < 0) {
    throw new RangeError(`total must be a non-negative integer, got ${total}`);
  }
  const quotas = DIFFICULTY_TIERS.map((tier, order) => {
    const scaled = total * TIER_SHARES[tier];
    return { tier, order, count: Math.floor(scaled / 100), remainder: scaled % 100 };
  });
  let leftover = total - quotas.reduce((sum, quota) => sum + quota.count, 0);
  const byRemainder = [...quotas].sort((a, b) => b.remainder - a.remainder || a.order - b.order);
  for (const quota of byRemainder) {
    if (leftover <= 0) break;
    quota.count += 1;
    leftover -= 1;
  }
  return {
    below: quotas[0].count,
    at: quotas[1].count,
    above: quotas[2].count,
  };
}

export function tierLevels(studentLevel: MasteryLevel): Record<DifficultyTier, MasteryLevel> {
  return {
    below: clampLevel(studentLevel - 1),
    at: studentLevel,
    above: clampLevel(studentLevel + 1),
  };
}
