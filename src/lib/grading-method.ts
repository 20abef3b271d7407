/**
 * Versioned grading method: every constant that shapes a Grade Record.
 * Changing any value here changes historical comparability, so bump `version`.
 */

import { ContractViolationError } from './errors';

export type GradeLetter = 'A' | 'B' | 'C' | 'D' | 'F';

/** How a push (TIE) counts when calibrating the confidence prior from past outcomes */
export type PushPolicy = 'exclude' | 'win' | 'loss' | 'half';

export interface ComponentWeights {
  ev: number;
  timing: number;
  trend: number;
  confidence: number;
}

export interface GradeThresholds {
  A: number;
  B: number;
  C: number;
  D: number;
}

export interface TimingBand {
  /** Last-moments band before the start, in hours; the score ramps up across it */
  closeHours: number;
  /** End of the full-score plateau, in hours before the start */
  peakEndHours: number;
  /** Exponential decay constant beyond the plateau, in hours */
  decayHours: number;
}

export interface ConfidenceParams {
  prior: number;
  evLikelihoodSpread: number;
  timingLikelihoodBase: number;
  timingLikelihoodSpread: number;
  /** Score used when there is not enough history to estimate */
  floor: number;
}

export interface GradingMethod {
  version: string;
  /** EV percent above which a quote is treated as a pricing error and clamped */
  realismCeiling: number;
  evScale: number;
  weights: ComponentWeights;
  thresholds: GradeThresholds;
  volatilityScale: number;
  trendScale: number;
  timingBand: TimingBand;
  confidence: ConfidenceParams;
  pushPolicy: PushPolicy;
}

export const DEFAULT_GRADING_METHOD: GradingMethod = {
  version: 'ev-timing-trend-bayes/2',
  realismCeiling: 15,
  evScale: 4,
  weights: {
    ev: 0.4,
    timing: 0.15,
    trend: 0.2,
    confidence: 0.25,
  },
  thresholds: {
    A: 90,
    B: 80,
    C: 70,
    D: 65,
  },
  volatilityScale: 4,
  trendScale: 3,
  timingBand: {
    closeHours: 0.5,
    peakEndHours: 3,
    decayHours: 12,
  },
  confidence: {
    prior: 0.52,
    evLikelihoodSpread: 0.4,
    timingLikelihoodBase: 0.5,
    timingLikelihoodSpread: 0.3,
    floor: 50,
  },
  pushPolicy: 'exclude',
};

const PUSH_POLICIES: readonly PushPolicy[] = ['exclude', 'win', 'loss', 'half'];

export function isPushPolicy(value: string): value is PushPolicy {
  return (PUSH_POLICIES as readonly string[]).includes(value);
}

/**
 * Throws when the method cannot produce a convex, monotonic grade
 */
export function validateGradingMethod(method: GradingMethod): void {
  const weights = Object.values(method.weights);
  if (weights.some(w => !Number.isFinite(w) || w < 0)) {
    throw new ContractViolationError(`Grading method ${method.version}: weights must be non-negative`);
  }

  const total = weights.reduce((a, b) => a + b, 0);
  if (Math.abs(total - 1) > 1e-9) {
    throw new ContractViolationError(
      `Grading method ${method.version}: weights sum to ${total}, expected 1`
    );
  }

  const { A, B, C, D } = method.thresholds;
  if (!(A > B && B > C && C > D)) {
    throw new ContractViolationError(
      `Grading method ${method.version}: thresholds must be strictly descending A > B > C > D`
    );
  }

  if (method.realismCeiling <= 0 || method.evScale <= 0 || method.volatilityScale <= 0 || method.trendScale <= 0) {
    throw new ContractViolationError(`Grading method ${method.version}: scales must be positive`);
  }

  const { closeHours, peakEndHours, decayHours } = method.timingBand;
  if (!(closeHours > 0 && peakEndHours >= closeHours && decayHours > 0)) {
    throw new ContractViolationError(`Grading method ${method.version}: invalid timing band`);
  }

  const { prior } = method.confidence;
  if (!(prior > 0 && prior < 1)) {
    throw new ContractViolationError(`Grading method ${method.version}: prior must be in (0, 1)`);
  }
}

/**
 * Copy of the method with a calibrated prior; the version is unchanged because
 * the prior is data, not method
 */
export function withPrior(method: GradingMethod, prior: number): GradingMethod {
  return {
    ...method,
    confidence: { ...method.confidence, prior },
  };
}
