/**
 * Batch entry point for grading and resolution
 * Re-exports the core modules so callers only need one import
 */

import type { GradingEngine } from './grading';
import type { OutcomeResolver } from './outcome-resolver';
import { hoursBetween, toDate } from './scoring';
import type {
  CorpusRow,
  GradeRecord,
  HistorySnapshot,
  OpportunityInput,
  ResolutionRecord,
  ResolutionRequest,
} from '../types/opportunity';

export type { GradeLetter, GradingMethod, PushPolicy } from './grading-method';
export { DEFAULT_GRADING_METHOD, validateGradingMethod, withPrior } from './grading-method';
export {
  GradingEngine,
  assignGrade,
  composeGrade,
  computeEvScore,
  computeTimingScore,
  computeTrendScore,
} from './grading';
export { calibratePrior, estimateConfidence } from './confidence';
export { americanToDecimal, computeMarketDiagnostics, impliedProbability, kellyFraction } from './odds';
export { parseDescription, describeCondition } from './description-parser';
export type { ParseResult, ResolutionCondition, StatSpec } from './description-parser';
export { matchSubject, normalizeName, splitEventTeams } from './subject-matcher';
export { OutcomeResolver, evaluateCondition } from './outcome-resolver';
export { compareCandidates, selectCanonicalOpportunities } from './dedup';

/**
 * Collapse repeated observations to the most recent one per identity,
 * keeping first-appearance order
 */
export function latestByIdentity(observations: OpportunityInput[]): OpportunityInput[] {
  const latest = new Map<string, { observation: OpportunityInput; at: number }>();

  for (const observation of observations) {
    const at = toDate(observation.observed_at)?.getTime() ?? Number.NEGATIVE_INFINITY;
    const current = latest.get(observation.identity);
    if (!current || at >= current.at) {
      latest.set(observation.identity, { observation, at });
    }
  }

  return Array.from(latest.values(), entry => entry.observation);
}

/**
 * Grade every opportunity; missing history is graded as a first sighting
 */
export function gradeOpportunities(
  engine: GradingEngine,
  opportunities: OpportunityInput[],
  histories: Map<string, HistorySnapshot[]>,
  evaluatedAt: Date = new Date()
): GradeRecord[] {
  return opportunities.map(opportunity =>
    engine.grade(opportunity, histories.get(opportunity.identity) ?? [], evaluatedAt)
  );
}

/**
 * Box scores are only trusted once the settle delay has passed since the start
 */
export function isReadyForResolution(
  eventStart: string | Date | null,
  now: Date,
  settleDelayHours: number
): boolean {
  const start = toDate(eventStart);
  if (!start) return false;
  return hoursBetween(start, now) >= settleDelayHours;
}

export function resolveOpportunities(
  resolver: OutcomeResolver,
  requests: ResolutionRequest[],
  corpus: CorpusRow[],
  evaluatedAt: Date = new Date()
): ResolutionRecord[] {
  return requests.map(request => resolver.resolve(request, corpus, evaluatedAt));
}
