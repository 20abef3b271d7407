/**
 * Opportunity grading: EV, timing, EV trend and Bayesian confidence combined
 * into a composite score and letter grade
 */

import { v4 as uuidv4 } from 'uuid';
import { config } from './config';
import { estimateConfidence } from './confidence';
import { ContractViolationError } from './errors';
import {
  validateGradingMethod,
  withPrior,
  type ComponentWeights,
  type GradeLetter,
  type GradeThresholds,
  type GradingMethod,
  type TimingBand,
} from './grading-method';
import { Logger } from './logger';
import { computeMarketDiagnostics } from './odds';
import { clamp, hoursBetween, saturate, smoothstep, toDate, toNumber } from './scoring';
import type {
  DiagnosticFlag,
  GradeRecord,
  HistorySnapshot,
  OpportunityInput,
} from '../types/opportunity';

export interface EvScore {
  score: number;
  effectiveEv: number;
  clamped: boolean;
}

/**
 * EV percent → [0, 100]. Values above the realism ceiling are clamped first, so
 * a 40% quote scores exactly like a quote at the ceiling.
 */
export function computeEvScore(
  evPercent: number,
  method: Pick<GradingMethod, 'realismCeiling' | 'evScale'>
): EvScore {
  const clamped = evPercent > method.realismCeiling;
  const effectiveEv = clamped ? method.realismCeiling : evPercent;

  if (effectiveEv <= 0) {
    return { score: 0, effectiveEv, clamped };
  }

  const score = 100 * (1 - Math.exp(-effectiveEv / method.evScale));
  return { score: clamp(score, 0, 100), effectiveEv, clamped };
}

/**
 * Bump over hours-to-event: ramps up across the last-moments band, full score
 * on the plateau, decays smoothly further out. Zero once the event has started.
 */
export function computeTimingScore(hoursToEvent: number, band: TimingBand): number {
  if (hoursToEvent <= 0) return 0;

  if (hoursToEvent < band.closeHours) {
    return 100 * smoothstep(hoursToEvent / band.closeHours);
  }

  if (hoursToEvent <= band.peakEndHours) return 100;

  return 100 * Math.exp(-(hoursToEvent - band.peakEndHours) / band.decayHours);
}

/**
 * 50 for a flat EV since first seen, above for improving, below for decaying
 */
export function computeTrendScore(firstSeenEv: number, currentEv: number, trendScale: number): number {
  return clamp(50 + 50 * saturate(currentEv - firstSeenEv, trendScale), 0, 100);
}

export function assignGrade(compositeScore: number, thresholds: GradeThresholds): GradeLetter {
  if (compositeScore >= thresholds.A) return 'A';
  if (compositeScore >= thresholds.B) return 'B';
  if (compositeScore >= thresholds.C) return 'C';
  if (compositeScore >= thresholds.D) return 'D';
  return 'F';
}

export type ComponentScores = Record<keyof ComponentWeights, number | null>;

export interface ComposedGrade {
  components: Record<keyof ComponentWeights, number>;
  compositeScore: number;
  gradeLetter: GradeLetter;
  missing: Array<keyof ComponentWeights>;
}

/**
 * Weighted sum of the four components. A missing component contributes zero
 * instead of aborting, so a partially observed opportunity still gets a grade.
 */
export function composeGrade(
  scores: ComponentScores,
  method: Pick<GradingMethod, 'weights' | 'thresholds'>
): ComposedGrade {
  const keys: Array<keyof ComponentWeights> = ['ev', 'timing', 'trend', 'confidence'];
  const missing: Array<keyof ComponentWeights> = [];
  const components = { ev: 0, timing: 0, trend: 0, confidence: 0 };

  let compositeScore = 0;
  for (const key of keys) {
    const score = scores[key];
    if (score === null || !Number.isFinite(score)) {
      missing.push(key);
      continue;
    }
    components[key] = clamp(score, 0, 100);
    compositeScore += method.weights[key] * components[key];
  }

  compositeScore = clamp(compositeScore, 0, 100);

  return {
    components,
    compositeScore,
    gradeLetter: assignGrade(compositeScore, method.thresholds),
    missing,
  };
}

interface ParsedSnapshot {
  at: Date;
  ev: number | null;
}

function parseHistory(history: HistorySnapshot[]): { snapshots: ParsedSnapshot[]; reordered: boolean } {
  const snapshots: ParsedSnapshot[] = [];
  for (const snapshot of history) {
    const at = toDate(snapshot.observed_at);
    if (at) snapshots.push({ at, ev: toNumber(snapshot.ev_percent) });
  }

  const reordered = snapshots.some((s, i) => i > 0 && s.at.getTime() < snapshots[i - 1].at.getTime());
  if (reordered) {
    snapshots.sort((a, b) => a.at.getTime() - b.at.getTime());
  }
  return { snapshots, reordered };
}

export class GradingEngine {
  private readonly logger: Logger;

  constructor(
    private readonly method: GradingMethod = config.gradingMethod,
    logger?: Logger
  ) {
    validateGradingMethod(method);
    this.logger = logger ?? new Logger('grading');
  }

  get version(): string {
    return this.method.version;
  }

  get gradingMethod(): GradingMethod {
    return this.method;
  }

  /**
   * Same method with a calibrated confidence prior
   */
  withPrior(prior: number): GradingEngine {
    return new GradingEngine(withPrior(this.method, prior), this.logger);
  }

  /**
   * Grade one opportunity against its prior quotes (oldest first)
   */
  grade(
    opportunity: OpportunityInput,
    history: HistorySnapshot[],
    evaluatedAt: Date = new Date()
  ): GradeRecord {
    if (!opportunity.identity || opportunity.identity.trim() === '') {
      throw new ContractViolationError('Cannot grade an opportunity without an identity');
    }

    const flags: DiagnosticFlag[] = [];
    const method = this.method;

    const currentEv = toNumber(opportunity.current_ev_percent);
    const observedAt = toDate(opportunity.observed_at);
    const eventStart = toDate(opportunity.event_start_time);

    const { snapshots, reordered } = parseHistory(history);
    if (reordered) flags.push('history-unordered');

    let firstSeen: ParsedSnapshot | null = snapshots[0] ?? null;
    if (!firstSeen) {
      flags.push('missing-history');
      firstSeen = observedAt ? { at: observedAt, ev: currentEv } : null;
    }

    // EV
    let evScore: number | null = null;
    let effectiveEv: number | null = null;
    if (currentEv === null) {
      flags.push('missing-ev');
    } else {
      const ev = computeEvScore(currentEv, method);
      evScore = ev.score;
      effectiveEv = ev.effectiveEv;
      if (ev.clamped) flags.push('ev-clamped');
    }

    // Timing
    let timingScore: number | null = null;
    let hoursToEvent: number | null = null;
    if (eventStart && observedAt) {
      hoursToEvent = hoursBetween(observedAt, eventStart);
      timingScore = computeTimingScore(hoursToEvent, method.timingBand);
    } else {
      flags.push('missing-event-time');
    }

    // Trend
    const firstSeenEv = firstSeen?.ev ?? null;
    const trendScore =
      currentEv !== null && firstSeenEv !== null
        ? computeTrendScore(firstSeenEv, currentEv, method.trendScale)
        : null;

    // Confidence
    const confidence = estimateConfidence(
      {
        firstSeenEv,
        currentEv,
        firstSeenAt: firstSeen?.at ?? null,
        currentAt: observedAt,
        eventStart,
      },
      method
    );
    for (const flag of confidence.flags) {
      if (!flags.includes(flag)) flags.push(flag);
    }

    const composed = composeGrade(
      { ev: evScore, timing: timingScore, trend: trendScore, confidence: confidence.score },
      method
    );

    const record: GradeRecord = {
      id: uuidv4(),
      identity: opportunity.identity,
      evaluated_at: evaluatedAt.toISOString(),
      ev_score: composed.components.ev,
      timing_score: composed.components.timing,
      ev_trend_score: composed.components.trend,
      bayesian_confidence: composed.components.confidence,
      composite_score: composed.compositeScore,
      grade_letter: composed.gradeLetter,
      grading_method_version: method.version,
      diagnostics: {
        flags,
        raw_ev_percent: currentEv,
        effective_ev_percent: effectiveEv,
        first_seen_ev_percent: firstSeenEv,
        hours_to_event: hoursToEvent,
        confidence: {
          prior: confidence.prior,
          ev_delta: confidence.evDelta,
          elapsed_fraction: confidence.elapsedFraction,
          ev_likelihood: confidence.evLikelihood,
          timing_likelihood: confidence.timingLikelihood,
        },
        market: computeMarketDiagnostics(toNumber(opportunity.current_odds), effectiveEv),
      },
    };

    this.logger.debug(() =>
      `Composite ${record.identity}: ` +
      `(${method.weights.ev} * ${record.ev_score.toFixed(2)}) + ` +
      `(${method.weights.timing} * ${record.timing_score.toFixed(2)}) + ` +
      `(${method.weights.trend} * ${record.ev_trend_score.toFixed(2)}) + ` +
      `(${method.weights.confidence} * ${record.bayesian_confidence.toFixed(2)}) = ${record.composite_score.toFixed(2)}`
    );
    if (flags.length > 0) {
      this.logger.debug(() => `Degraded inputs for ${record.identity}: ${flags.join(', ')}`);
    }

    return record;
  }
}
