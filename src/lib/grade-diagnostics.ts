/**
 * Cycle summaries for grading and resolution runs
 */

import type { GradeLetter } from './grading-method';
import { formatPercentage, formatScore } from './utils';
import type {
  DiagnosticFlag,
  GradeRecord,
  OutcomeTag,
  PendReasonCode,
  ResolutionRecord,
} from '../types/opportunity';

// Implausible input is recovered by clamping; it is not a degraded input
const IMPLAUSIBLE_FLAGS: readonly DiagnosticFlag[] = ['ev-clamped'];

export interface GradingSummary {
  totalGraded: number;
  byLetter: Record<GradeLetter, number>;
  averageComposite: number;
  degraded: number;
  clamped: number;
  flagCounts: Partial<Record<DiagnosticFlag, number>>;
  recommendations: string[];
}

export interface ResolutionSummary {
  totalResolved: number;
  byOutcome: Record<OutcomeTag, number>;
  pendReasons: Partial<Record<PendReasonCode, number>>;
  hitRate: number | null;
  recommendations: string[];
}

/**
 * Letter counts, average composite and a histogram of diagnostic flags
 */
export function summarizeGrades(records: GradeRecord[]): GradingSummary {
  const byLetter: Record<GradeLetter, number> = { A: 0, B: 0, C: 0, D: 0, F: 0 };
  const flagCounts: Partial<Record<DiagnosticFlag, number>> = {};
  let compositeTotal = 0;
  let degraded = 0;
  let clamped = 0;

  for (const record of records) {
    byLetter[record.grade_letter] += 1;
    compositeTotal += record.composite_score;

    const flags = record.diagnostics.flags;
    if (flags.some(flag => !IMPLAUSIBLE_FLAGS.includes(flag))) degraded += 1;
    if (flags.includes('ev-clamped')) clamped += 1;
    for (const flag of flags) {
      flagCounts[flag] = (flagCounts[flag] ?? 0) + 1;
    }
  }

  const recommendations: string[] = [];
  if (records.length > 0 && degraded > records.length * 0.5) {
    recommendations.push('Most grades ran on degraded inputs - check the observation history feed');
  }
  if (clamped > 0) {
    recommendations.push(`${clamped} quote(s) above the EV realism ceiling - likely stale or mispriced lines`);
  }

  return {
    totalGraded: records.length,
    byLetter,
    averageComposite: records.length > 0 ? compositeTotal / records.length : 0,
    degraded,
    clamped,
    flagCounts,
    recommendations,
  };
}

/**
 * Outcome counts and PEND_MANUAL reasons. Hit rate is WIN / (WIN + LOSS).
 */
export function summarizeOutcomes(records: ResolutionRecord[]): ResolutionSummary {
  const byOutcome: Record<OutcomeTag, number> = { WIN: 0, LOSS: 0, TIE: 0, PEND_MANUAL: 0 };
  const pendReasons: Partial<Record<PendReasonCode, number>> = {};

  for (const record of records) {
    byOutcome[record.outcome] += 1;
    if (record.reason_code !== 'decided') {
      pendReasons[record.reason_code] = (pendReasons[record.reason_code] ?? 0) + 1;
    }
  }

  const decided = byOutcome.WIN + byOutcome.LOSS;
  const recommendations: string[] = [];
  if ((pendReasons['unparseable-description'] ?? 0) > 0) {
    recommendations.push('Unparseable descriptions found - extend the stat keyword table');
  }
  if ((pendReasons['no-corpus-event'] ?? 0) > 0) {
    recommendations.push('Events missing from the result corpus - check the box-score import');
  }

  return {
    totalResolved: records.length,
    byOutcome,
    pendReasons,
    hitRate: decided > 0 ? byOutcome.WIN / decided : null,
    recommendations,
  };
}

/**
 * Format grading summary for logging
 */
export function formatGradingSummary(summary: GradingSummary): string {
  const lines: string[] = [];

  lines.push('🔍 GRADING SUMMARY');
  lines.push('═'.repeat(35));
  lines.push(`Opportunities Graded: ${summary.totalGraded}`);
  lines.push(
    `Grades: A ${summary.byLetter.A} | B ${summary.byLetter.B} | C ${summary.byLetter.C} | ` +
    `D ${summary.byLetter.D} | F ${summary.byLetter.F}`
  );
  lines.push(`Average Composite: ${formatScore(summary.averageComposite)}`);
  lines.push(`Degraded Inputs: ${summary.degraded}`);

  const flags = Object.entries(summary.flagCounts);
  if (flags.length > 0) {
    lines.push('\n📊 Flags:');
    flags.forEach(([flag, count]) => {
      lines.push(`  • ${flag}: ${count}`);
    });
  }

  if (summary.recommendations.length > 0) {
    lines.push('\n💡 Recommendations:');
    summary.recommendations.forEach(rec => {
      lines.push(`  • ${rec}`);
    });
  }

  return lines.join('\n');
}

export function formatResolutionSummary(summary: ResolutionSummary): string {
  const lines: string[] = [];

  lines.push('🔍 RESOLUTION SUMMARY');
  lines.push('═'.repeat(35));
  lines.push(`Opportunities Resolved: ${summary.totalResolved}`);
  lines.push(
    `Outcomes: WIN ${summary.byOutcome.WIN} | LOSS ${summary.byOutcome.LOSS} | ` +
    `TIE ${summary.byOutcome.TIE} | PEND_MANUAL ${summary.byOutcome.PEND_MANUAL}`
  );
  lines.push(`Hit Rate: ${summary.hitRate === null ? 'n/a' : formatPercentage(summary.hitRate)}`);

  const reasons = Object.entries(summary.pendReasons);
  if (reasons.length > 0) {
    lines.push('\n📊 Manual Review Reasons:');
    reasons.forEach(([reason, count]) => {
      lines.push(`  • ${reason}: ${count}`);
    });
  }

  if (summary.recommendations.length > 0) {
    lines.push('\n💡 Recommendations:');
    summary.recommendations.forEach(rec => {
      lines.push(`  • ${rec}`);
    });
  }

  return lines.join('\n');
}
