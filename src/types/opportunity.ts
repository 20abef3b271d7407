import type { GradeLetter } from '../lib/grading-method';

/** Current quote for one betting line, as supplied by the quote normalizer */
export interface OpportunityInput {
  identity: string;
  current_ev_percent: number | string | null;
  current_odds: number | string | null;
  current_line: string | null;
  event_identity: string;
  event_start_time: string | Date | null;
  observed_at: string | Date;
  sport: string;
  league: string;
  sportsbook: string;
  description: string;
  bet_category: string;
}

/** One prior quote of an opportunity; history arrays are oldest first */
export interface HistorySnapshot {
  observed_at: string | Date;
  ev_percent: number | string | null;
  odds: number | string | null;
  line: string | null;
}

export type DiagnosticFlag =
  | 'single-snapshot'
  | 'missing-history'
  | 'missing-confidence-inputs'
  | 'invalid-timing-window'
  | 'history-unordered'
  | 'missing-ev'
  | 'missing-event-time'
  | 'ev-clamped';

/** Odds-derived view of the quote; probabilities in [0, 1] */
export interface MarketDiagnostics {
  decimal_odds: number;
  implied_probability: number;
  fair_probability: number | null;
  edge: number | null;
  kelly_fraction: number | null;
}

export interface GradeDiagnostics {
  flags: DiagnosticFlag[];
  raw_ev_percent: number | null;
  effective_ev_percent: number | null;
  first_seen_ev_percent: number | null;
  hours_to_event: number | null;
  confidence: {
    prior: number;
    ev_delta: number | null;
    elapsed_fraction: number | null;
    ev_likelihood: number | null;
    timing_likelihood: number | null;
  };
  /** Informational only; not part of the composite */
  market: MarketDiagnostics | null;
}

export interface GradeRecord {
  id: string;
  identity: string;
  evaluated_at: string;
  ev_score: number;
  timing_score: number;
  ev_trend_score: number;
  bayesian_confidence: number;
  composite_score: number;
  grade_letter: GradeLetter;
  grading_method_version: string;
  diagnostics: GradeDiagnostics;
}

/** One primitive statistic from the authoritative results feed */
export interface CorpusRow {
  event_identity: string;
  event_date: string;
  team: string;
  subject_name: string;
  stat_category: string;
  stat_value: number | null;
}

export type OutcomeTag = 'WIN' | 'LOSS' | 'TIE' | 'PEND_MANUAL';

export type PendReasonCode =
  | 'unparseable-description'
  | 'period-scoped'
  | 'no-corpus-event'
  | 'ambiguous-event'
  | 'no-corpus-match'
  | 'ambiguous-subject'
  | 'stat-not-recorded'
  | 'conflicting-values';

export type ReasonCode = 'decided' | PendReasonCode;

/** An opportunity whose event has concluded and needs an outcome */
export interface ResolutionRequest {
  identity: string;
  event_identity: string;
  event_start_time: string | Date | null;
  description: string;
  bet_category: string;
}

export interface ResolutionRecord {
  identity: string;
  evaluated_at: string;
  outcome: OutcomeTag;
  matched_value: number | null;
  reason: string;
  reason_code: ReasonCode;
}
