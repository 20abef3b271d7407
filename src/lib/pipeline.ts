/**
 * One grading cycle and one resolution cycle against an OpportunityStore
 */

import { subHours } from 'date-fns';
import { config } from './config';
import { calibratePrior } from './confidence';
import { selectCanonicalOpportunities } from './dedup';
import { gradeOpportunities, isReadyForResolution, resolveOpportunities } from './engine';
import {
  formatGradingSummary,
  formatResolutionSummary,
  summarizeGrades,
  summarizeOutcomes,
  type GradingSummary,
  type ResolutionSummary,
} from './grade-diagnostics';
import type { GradingEngine } from './grading';
import { Logger } from './logger';
import type { OutcomeResolver } from './outcome-resolver';
import { toDate } from './scoring';
import type { OpportunityStore } from './store';
import { toEventDate } from './utils';
import type { GradeRecord, HistorySnapshot, ResolutionRecord, ResolutionRequest } from '../types/opportunity';

export interface GradingCycleOptions {
  since: Date;
  now?: Date;
  calibrate?: boolean;
  calibrationSampleSize?: number;
  logger?: Logger;
}

export interface GradingCycleResult {
  grades: GradeRecord[];
  summary: GradingSummary;
  /** One identity per (event, subject), best candidate first */
  canonicalIdentities: string[];
  prior: number;
}

export async function runGradingCycle(
  store: OpportunityStore,
  engine: GradingEngine,
  options: GradingCycleOptions
): Promise<GradingCycleResult> {
  const logger = options.logger ?? new Logger('cycle');
  const now = options.now ?? new Date();

  logger.section('Grading cycle', '📈');
  const opportunities = await store.fetchLatestObservations(options.since);
  logger.info(`Found ${opportunities.length} opportunities observed since ${options.since.toISOString()}`);

  let active = engine;
  if (options.calibrate) {
    const outcomes = await store.fetchRecentOutcomes(options.calibrationSampleSize ?? config.calibrationSampleSize);
    const method = engine.gradingMethod;
    const prior = calibratePrior(outcomes, method.pushPolicy, { fallback: method.confidence.prior });
    active = engine.withPrior(prior);
    logger.info(`Confidence prior ${prior.toFixed(3)} from ${outcomes.length} recent outcomes`);
  }

  const histories = opportunities.length > 0
    ? await store.fetchHistory(opportunities.map(o => o.identity))
    : new Map<string, HistorySnapshot[]>();

  const grades = gradeOpportunities(active, opportunities, histories, now);
  grades.forEach(record => logger.grade(record));

  if (grades.length > 0) {
    await store.saveGrades(grades);
  }

  const summary = summarizeGrades(grades);
  logger.info(formatGradingSummary(summary));

  return {
    grades,
    summary,
    canonicalIdentities: selectCanonicalOpportunities(opportunities).map(o => o.identity),
    prior: active.gradingMethod.confidence.prior,
  };
}

export interface ResolutionCycleOptions {
  now?: Date;
  settleDelayHours?: number;
  lookbackHours?: number;
  logger?: Logger;
}

export interface ResolutionCycleResult {
  outcomes: ResolutionRecord[];
  summary: ResolutionSummary;
}

/**
 * Corpus dates to load for a batch: the local calendar date plus the UTC one
 */
export function corpusDatesFor(requests: ResolutionRequest[], timeZone: string = config.appTimezone): string[] {
  const dates = new Set<string>();
  for (const request of requests) {
    const start = toDate(request.event_start_time);
    if (!start) continue;
    dates.add(toEventDate(start, timeZone));
    dates.add(start.toISOString().slice(0, 10));
  }
  return [...dates].sort();
}

export async function runResolutionCycle(
  store: OpportunityStore,
  resolver: OutcomeResolver,
  options: ResolutionCycleOptions = {}
): Promise<ResolutionCycleResult> {
  const logger = options.logger ?? new Logger('cycle');
  const now = options.now ?? new Date();
  const settleDelayHours = options.settleDelayHours ?? config.settleDelayHours;
  const lookbackHours = options.lookbackHours ?? config.resolutionLookbackHours;

  logger.section('Resolution cycle', '🏁');
  const requests = await store.fetchConcludedUnresolved(
    subHours(now, settleDelayHours),
    subHours(now, lookbackHours)
  );
  const ready = requests.filter(request => isReadyForResolution(request.event_start_time, now, settleDelayHours));
  logger.info(`Found ${ready.length} concluded opportunities awaiting an outcome`);

  const corpus = await store.fetchCorpus(corpusDatesFor(ready));
  logger.debug(`Loaded ${corpus.length} corpus rows`);

  const outcomes = resolveOpportunities(resolver, ready, corpus, now);
  if (outcomes.length > 0) {
    await store.saveOutcomes(outcomes);
  }

  const summary = summarizeOutcomes(outcomes);
  logger.info(formatResolutionSummary(summary));

  return { outcomes, summary };
}
