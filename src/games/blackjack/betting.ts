import type { BetMode, HouseRules } from '../../config/index.js';

/** Largest wager the ramp may reach for a given base bet. */
export function betCap(baseBet: number, rules: Pick<HouseRules, 'maxBetMultiplier' | 'maxBet'>): number {
  const byMultiplier = baseBet * rules.maxBetMultiplier;
  return rules.maxBet === undefined ? byMultiplier : Math.min(byMultiplier, rules.maxBet);
}

/**
 * Wager for the next round.
 *   fixed → base bet
 *   hi_lo → tc < 1 → base, tc = 1 → base×2, tc = 2 → base×3 … up to the cap
 */
export function nextBet(baseBet: number, mode: BetMode, priorTrueCount: number, cap: number): number {
  if (mode === 'fixed') return baseBet;
  const units = Math.max(0, Math.floor(priorTrueCount));
  return Math.min(baseBet * (1 + units), cap);
}
