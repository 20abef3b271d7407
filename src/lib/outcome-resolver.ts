/**
 * Outcome resolution: parse the bet description, find the event and subject in
 * the result corpus, and compare the recorded value against the line.
 * Anything that cannot be decided with certainty becomes PEND_MANUAL.
 */

import { describeCondition, parseDescription, type Comparator, type ResolutionCondition } from './description-parser';
import { ContractViolationError } from './errors';
import { Logger } from './logger';
import { hoursBetween, toDate } from './scoring';
import { toPrimitiveStat, STAT_LABELS, type PrimitiveStat } from './stats';
import { matchSubject, normalizeName, splitEventTeams, teamMatches } from './subject-matcher';
import type {
  CorpusRow,
  OutcomeTag,
  PendReasonCode,
  ResolutionRecord,
  ResolutionRequest,
} from '../types/opportunity';

export const VALUE_TOLERANCE = 1e-9;

// Corpus dates are calendar days; a late tip-off lands on the previous UTC day
export const EVENT_DATE_WINDOW = { beforeHours: 12, afterHours: 36 };

export type DecidedOutcome = Exclude<OutcomeTag, 'PEND_MANUAL'>;

/**
 * Landing exactly on the line is a push for Over/Under and a win for Exactly
 */
export function evaluateCondition(value: number, comparator: Comparator, threshold: number): DecidedOutcome {
  const diff = value - threshold;

  if (Math.abs(diff) <= VALUE_TOLERANCE) {
    return comparator === 'exact' ? 'WIN' : 'TIE';
  }

  switch (comparator) {
    case 'exact':
      return 'LOSS';
    case 'over':
      return diff > 0 ? 'WIN' : 'LOSS';
    case 'under':
      return diff < 0 ? 'WIN' : 'LOSS';
  }
}

type EventLookup =
  | { kind: 'found'; eventIdentity: string; rows: CorpusRow[] }
  | { kind: 'ambiguous'; events: string[] }
  | { kind: 'none' };

function groupByEvent(rows: CorpusRow[]): Map<string, CorpusRow[]> {
  const events = new Map<string, CorpusRow[]>();
  for (const row of rows) {
    const group = events.get(row.event_identity);
    if (group) {
      group.push(row);
    } else {
      events.set(row.event_identity, [row]);
    }
  }
  return events;
}

function eventDateNear(eventDate: string, eventStart: Date): boolean {
  const day = toDate(`${eventDate.slice(0, 10)}T00:00:00Z`);
  if (!day) return false;

  const hours = hoursBetween(day, eventStart);
  return hours >= -EVENT_DATE_WINDOW.beforeHours && hours <= EVENT_DATE_WINDOW.afterHours;
}

/**
 * Rows of the request's event: by identity, else by date and both team names
 */
export function findEventRows(request: ResolutionRequest, corpus: CorpusRow[]): EventLookup {
  const exact = corpus.filter(row => row.event_identity === request.event_identity);
  if (exact.length > 0) {
    return { kind: 'found', eventIdentity: request.event_identity, rows: exact };
  }

  const sides = splitEventTeams(request.event_identity);
  const eventStart = toDate(request.event_start_time);
  if (!sides || !eventStart) return { kind: 'none' };

  const candidates: Array<[string, CorpusRow[]]> = [];
  for (const [eventIdentity, rows] of groupByEvent(corpus)) {
    if (!rows.some(row => eventDateNear(row.event_date, eventStart))) continue;

    const teams = [...new Set(rows.map(row => row.team))];
    const coversBoth = sides.every(side => teams.some(team => teamMatches(side, team)));
    if (coversBoth) candidates.push([eventIdentity, rows]);
  }

  if (candidates.length === 1) {
    return { kind: 'found', eventIdentity: candidates[0][0], rows: candidates[0][1] };
  }
  if (candidates.length > 1) {
    return { kind: 'ambiguous', events: candidates.map(([eventIdentity]) => eventIdentity).sort() };
  }
  return { kind: 'none' };
}

type StatLookup =
  | { kind: 'value'; value: number }
  | { kind: 'missing' }
  | { kind: 'conflict'; values: number[] };

function lookupStat(rows: CorpusRow[], stat: PrimitiveStat): StatLookup {
  const values = new Set<number>();
  for (const row of rows) {
    if (toPrimitiveStat(row.stat_category) !== stat) continue;
    if (row.stat_value !== null && Number.isFinite(row.stat_value)) values.add(row.stat_value);
  }

  if (values.size === 0) return { kind: 'missing' };
  if (values.size > 1) return { kind: 'conflict', values: [...values].sort((a, b) => a - b) };
  return { kind: 'value', value: [...values][0] };
}

type ValueLookup =
  | { kind: 'value'; value: number }
  | { kind: 'pend'; code: PendReasonCode; reason: string };

/**
 * Aggregate the condition's stat from the subject's rows
 */
function computeStatValue(condition: ResolutionCondition, subject: string, rows: CorpusRow[]): ValueLookup {
  const values: number[] = [];
  const missing: PrimitiveStat[] = [];

  for (const component of condition.stat.components) {
    const lookup = lookupStat(rows, component);
    if (lookup.kind === 'conflict') {
      return {
        kind: 'pend',
        code: 'conflicting-values',
        reason: `Conflicting ${STAT_LABELS[component]} values for ${subject}: ${lookup.values.join(', ')}`,
      };
    }
    if (lookup.kind === 'missing') {
      missing.push(component);
    } else {
      values.push(lookup.value);
    }
  }

  if (condition.stat.aggregate === 'double-digits') {
    // unrecorded milestone components count as below ten
    if (values.length === 0) {
      return { kind: 'pend', code: 'stat-not-recorded', reason: `No ${condition.stat.label} stats recorded for ${subject}` };
    }
    return { kind: 'value', value: values.filter(value => value >= 10).length };
  }

  if (missing.length > 0) {
    const labels = missing.map(stat => STAT_LABELS[stat]).join(', ');
    return { kind: 'pend', code: 'stat-not-recorded', reason: `No ${labels} recorded for ${subject}` };
  }

  return { kind: 'value', value: values.reduce((sum, value) => sum + value, 0) };
}

export interface OutcomeResolverOptions {
  logger?: Logger;
}

export class OutcomeResolver {
  private readonly logger: Logger;

  constructor(options: OutcomeResolverOptions = {}) {
    this.logger = options.logger ?? new Logger('resolver');
  }

  /**
   * Decide one concluded opportunity. The same request and corpus always give
   * the same outcome, value and reason.
   */
  resolve(request: ResolutionRequest, corpus: CorpusRow[], evaluatedAt: Date = new Date()): ResolutionRecord {
    if (!request.identity || request.identity.trim() === '') {
      throw new ContractViolationError('Cannot resolve a request without an identity');
    }
    if (!request.event_identity || request.event_identity.trim() === '') {
      throw new ContractViolationError(`Cannot resolve ${request.identity} without an event identity`);
    }

    const record = (
      outcome: OutcomeTag,
      matchedValue: number | null,
      reasonCode: ResolutionRecord['reason_code'],
      reason: string
    ): ResolutionRecord => ({
      identity: request.identity,
      evaluated_at: evaluatedAt.toISOString(),
      outcome,
      matched_value: matchedValue,
      reason,
      reason_code: reasonCode,
    });

    const pend = (code: PendReasonCode, reason: string): ResolutionRecord => {
      this.logger.pendManual(request.identity, reason);
      return record('PEND_MANUAL', null, code, reason);
    };

    const parsed = parseDescription(request.description, request.bet_category);
    if (!parsed.ok) {
      const code = parsed.reason === 'period-scoped' ? 'period-scoped' : 'unparseable-description';
      return pend(code, `Could not parse "${request.description}": ${parsed.detail}`);
    }
    const condition = parsed.condition;

    const event = findEventRows(request, corpus);
    if (event.kind === 'none') {
      return pend('no-corpus-event', `No corpus event for ${request.event_identity}`);
    }
    if (event.kind === 'ambiguous') {
      return pend('ambiguous-event', `Several corpus events match ${request.event_identity}: ${event.events.join(', ')}`);
    }

    const names = [...new Set(event.rows.map(row => row.subject_name))];
    const match = matchSubject(condition.subject, names);
    if (match.kind === 'none') {
      return pend('no-corpus-match', `No corpus match for subject "${condition.subject}" in ${event.eventIdentity}`);
    }
    if (match.kind === 'ambiguous') {
      return pend(
        'ambiguous-subject',
        `Subject "${condition.subject}" matches several corpus names: ${match.candidates.join(', ')}`
      );
    }

    const key = normalizeName(match.subject);
    const subjectRows = event.rows.filter(row => normalizeName(row.subject_name) === key);
    const lookup = computeStatValue(condition, match.subject, subjectRows);
    if (lookup.kind === 'pend') {
      return pend(lookup.code, lookup.reason);
    }

    const outcome = evaluateCondition(lookup.value, condition.comparator, condition.threshold);
    this.logger.debug(() => `${request.identity}: ${describeCondition(condition)} vs ${lookup.value} → ${outcome}`);

    return record(
      outcome,
      lookup.value,
      'decided',
      `${describeCondition(condition)}: ${match.subject} recorded ${lookup.value}`
    );
  }
}
