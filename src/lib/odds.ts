/**
 * American odds conversion and market-relative sizing
 */

import { clamp } from './scoring';
import type { MarketDiagnostics } from '../types/opportunity';

/**
 * Convert American odds to decimal odds; |odds| below 100 is not a valid price
 */
export function americanToDecimal(american: number): number | null {
  if (!Number.isFinite(american) || Math.abs(american) < 100) return null;
  return american > 0 ? 1 + american / 100 : 1 + 100 / Math.abs(american);
}

/**
 * Convert decimal odds to the market's implied probability
 */
export function impliedProbability(decimal: number): number {
  return 1 / decimal;
}

/**
 * Win probability at which the quote is worth `evPercent`
 */
export function fairProbability(evPercent: number, decimal: number): number {
  return clamp((1 + evPercent / 100) / decimal, 0, 1);
}

/**
 * Full Kelly stake as a fraction of bankroll; zero when there is no edge
 */
export function kellyFraction(probability: number, decimal: number): number {
  const net = decimal - 1;
  return Math.max(0, (net * probability - (1 - probability)) / net);
}

/**
 * Market view of one quote. Null when the odds are missing or not a valid
 * American price; the EV-derived fields are null without an EV.
 */
export function computeMarketDiagnostics(odds: number | null, evPercent: number | null): MarketDiagnostics | null {
  if (odds === null) return null;

  const decimal = americanToDecimal(odds);
  if (decimal === null) return null;

  const implied = impliedProbability(decimal);
  if (evPercent === null) {
    return {
      decimal_odds: decimal,
      implied_probability: implied,
      fair_probability: null,
      edge: null,
      kelly_fraction: null,
    };
  }

  const fair = fairProbability(evPercent, decimal);
  return {
    decimal_odds: decimal,
    implied_probability: implied,
    fair_probability: fair,
    edge: fair - implied,
    kelly_fraction: kellyFraction(fair, decimal),
  };
}
