/**
 * Bayesian confidence that an opportunity holds its edge, from how its EV has
 * moved since first seen and where in the pre-event window it was observed.
 *
 * P(hold | signals) = π·P(ev|hold)·P(timing|hold) / P(signals), with the
 * not-hold likelihoods taken as complements.
 */

import type { ConfidenceParams, GradingMethod, PushPolicy } from './grading-method';
import type { DiagnosticFlag, OutcomeTag } from '../types/opportunity';
import { clamp, saturate } from './scoring';

export interface ConfidenceInputs {
  firstSeenEv: number | null;
  currentEv: number | null;
  firstSeenAt: Date | null;
  currentAt: Date | null;
  eventStart: Date | null;
}

export interface ConfidenceEstimate {
  score: number;
  prior: number;
  evDelta: number | null;
  elapsedFraction: number | null;
  evLikelihood: number | null;
  timingLikelihood: number | null;
  flags: DiagnosticFlag[];
}

type EstimationParams = Pick<GradingMethod, 'volatilityScale'> & { confidence: ConfidenceParams };

function degraded(params: ConfidenceParams, flag: DiagnosticFlag, evDelta: number | null = null): ConfidenceEstimate {
  return {
    score: params.floor,
    prior: params.prior,
    evDelta,
    elapsedFraction: null,
    evLikelihood: null,
    timingLikelihood: null,
    flags: [flag],
  };
}

/**
 * P(ev signal | hold): 0.5 for a flat EV, moving towards 0.5 ± spread as the
 * change grows relative to the volatility scale
 */
export function evLikelihood(evDelta: number, volatilityScale: number, spread: number): number {
  return 0.5 + spread * Math.sign(evDelta) * saturate(Math.abs(evDelta), volatilityScale);
}

/**
 * P(timing signal | hold): lowest at the edges of the first-seen→start window
 * (early noise, closing line) and highest half-way through
 */
export function timingLikelihood(elapsedFraction: number, base: number, spread: number): number {
  const f = clamp(elapsedFraction, 0, 1);
  return base + spread * 4 * f * (1 - f);
}

export function posterior(prior: number, pEv: number, pTiming: number): number {
  const hold = prior * pEv * pTiming;
  const notHold = (1 - prior) * (1 - pEv) * (1 - pTiming);
  const evidence = hold + notHold;
  return evidence > 0 ? hold / evidence : prior;
}

export function estimateConfidence(inputs: ConfidenceInputs, method: EstimationParams): ConfidenceEstimate {
  const params = method.confidence;
  const { firstSeenEv, currentEv, firstSeenAt, currentAt, eventStart } = inputs;

  if (firstSeenEv === null || currentEv === null || !firstSeenAt || !currentAt || !eventStart) {
    return degraded(params, 'missing-confidence-inputs');
  }

  const evDelta = currentEv - firstSeenEv;
  if (firstSeenAt.getTime() >= currentAt.getTime()) {
    return degraded(params, 'single-snapshot', evDelta);
  }

  const flags: DiagnosticFlag[] = [];
  const window = eventStart.getTime() - firstSeenAt.getTime();
  let elapsedFraction = 0;
  if (window > 0) {
    elapsedFraction = clamp((currentAt.getTime() - firstSeenAt.getTime()) / window, 0, 1);
  } else {
    flags.push('invalid-timing-window');
  }

  const pEv = evLikelihood(evDelta, method.volatilityScale, params.evLikelihoodSpread);
  const pTiming = timingLikelihood(elapsedFraction, params.timingLikelihoodBase, params.timingLikelihoodSpread);
  const score = clamp(posterior(params.prior, pEv, pTiming) * 100, 0, 100);

  return {
    score,
    prior: params.prior,
    evDelta,
    elapsedFraction,
    evLikelihood: pEv,
    timingLikelihood: pTiming,
    flags,
  };
}

export interface CalibrationOptions {
  minSamples?: number;
  fallback: number;
}

/**
 * Hit rate of decided outcomes, used as the prior. PEND_MANUAL never counts;
 * TIE counts according to the push policy.
 */
export function calibratePrior(
  outcomes: OutcomeTag[],
  pushPolicy: PushPolicy,
  { minSamples = 20, fallback }: CalibrationOptions
): number {
  let wins = 0;
  let samples = 0;

  for (const outcome of outcomes) {
    if (outcome === 'WIN') {
      wins += 1;
      samples += 1;
    } else if (outcome === 'LOSS') {
      samples += 1;
    } else if (outcome === 'TIE') {
      switch (pushPolicy) {
        case 'exclude':
          break;
        case 'win':
          wins += 1;
          samples += 1;
          break;
        case 'loss':
          samples += 1;
          break;
        case 'half':
          wins += 0.5;
          samples += 1;
          break;
      }
    }
  }

  if (samples < minSamples) return fallback;

  // keep the prior strictly inside (0, 1) so the posterior stays defined
  return clamp(wins / samples, 0.01, 0.99);
}
