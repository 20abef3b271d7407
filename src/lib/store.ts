/**
 * Persistence boundary: observations in, grades and outcomes out
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { config } from './config';
import { latestByIdentity } from './engine';
import { Logger } from './logger';
import { toNumber } from './scoring';
import type { TableInsert, TableName } from './supabase';
import type {
  CorpusRow,
  GradeRecord,
  HistorySnapshot,
  OpportunityInput,
  OutcomeTag,
  ResolutionRecord,
  ResolutionRequest,
} from '../types/opportunity';

export interface OpportunityStore {
  /** Most recent observation per identity, observed at or after `since` */
  fetchLatestObservations(since: Date): Promise<OpportunityInput[]>;
  /** Every observation per identity, oldest first */
  fetchHistory(identities: string[]): Promise<Map<string, HistorySnapshot[]>>;
  /** Opportunities started before `before` without a WIN, LOSS or TIE */
  fetchConcludedUnresolved(before: Date, since: Date): Promise<ResolutionRequest[]>;
  fetchCorpus(eventDates: string[]): Promise<CorpusRow[]>;
  fetchRecentOutcomes(limit: number): Promise<OutcomeTag[]>;
  saveGrades(records: GradeRecord[]): Promise<void>;
  saveOutcomes(records: ResolutionRecord[]): Promise<void>;
}

type QueryResult = { data: unknown[] | null; error: { message: string } | null };

const OUTCOME_TAGS: readonly OutcomeTag[] = ['WIN', 'LOSS', 'TIE', 'PEND_MANUAL'];
const TERMINAL_OUTCOMES: readonly OutcomeTag[] = ['WIN', 'LOSS', 'TIE'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function text(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function nullableText(row: Record<string, unknown>, key: string): string | null {
  const value = text(row, key);
  return value === '' ? null : value;
}

function isOutcomeTag(value: unknown): value is OutcomeTag {
  return typeof value === 'string' && OUTCOME_TAGS.some(tag => tag === value);
}

/**
 * Narrow a `betting_data` row; rows without identity or timestamp are dropped
 */
export function toOpportunityInput(row: unknown): OpportunityInput | null {
  if (!isRecord(row)) return null;

  const identity = text(row, 'identity');
  const observedAt = text(row, 'observed_at');
  if (!identity || !observedAt) return null;

  return {
    identity,
    current_ev_percent: toNumber(row.ev_percent),
    current_odds: toNumber(row.odds),
    current_line: nullableText(row, 'line'),
    event_identity: text(row, 'event_identity'),
    event_start_time: nullableText(row, 'event_start_time'),
    observed_at: observedAt,
    sport: text(row, 'sport'),
    league: text(row, 'league'),
    sportsbook: text(row, 'sportsbook'),
    description: text(row, 'description'),
    bet_category: text(row, 'bet_category'),
  };
}

export function toCorpusRow(row: unknown): CorpusRow | null {
  if (!isRecord(row)) return null;

  const eventIdentity = text(row, 'event_identity');
  const subjectName = text(row, 'subject_name');
  if (!eventIdentity || !subjectName) return null;

  return {
    event_identity: eventIdentity,
    event_date: text(row, 'event_date'),
    team: text(row, 'team'),
    subject_name: subjectName,
    stat_category: text(row, 'stat_category'),
    stat_value: toNumber(row.stat_value),
  };
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export interface SupabaseStoreOptions {
  batchSize?: number;
  pageSize?: number;
  logger?: Logger;
}

export class SupabaseOpportunityStore implements OpportunityStore {
  private readonly batchSize: number;
  private readonly pageSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly client: SupabaseClient,
    options: SupabaseStoreOptions = {}
  ) {
    this.batchSize = options.batchSize ?? config.batchSize;
    this.pageSize = options.pageSize ?? config.pageSize;
    this.logger = options.logger ?? new Logger('store');
  }

  /**
   * Read every page of a query; `build` receives the inclusive row range
   */
  private async fetchAllPages(
    label: string,
    build: (from: number, to: number) => PromiseLike<QueryResult>
  ): Promise<unknown[]> {
    const rows: unknown[] = [];

    for (let from = 0; ; from += this.pageSize) {
      const { data, error } = await build(from, from + this.pageSize - 1);
      if (error) {
        throw new Error(`Error fetching ${label}: ${error.message}`);
      }

      const page = data ?? [];
      rows.push(...page);
      if (page.length < this.pageSize) break;
    }

    this.logger.debug(`Fetched ${rows.length} ${label} rows`);
    return rows;
  }

  private async upsertBatches<T extends TableName>(
    table: T,
    rows: Array<TableInsert<T>>,
    onConflict: string
  ): Promise<void> {
    for (const batch of chunk(rows, this.batchSize)) {
      const { error } = await this.client.from(table).upsert(batch, { onConflict });
      if (error) {
        throw new Error(`Error saving ${table}: ${error.message}`);
      }
    }
  }

  async fetchLatestObservations(since: Date): Promise<OpportunityInput[]> {
    const rows = await this.fetchAllPages('observations', (from, to) =>
      this.client
        .from('betting_data')
        .select('*')
        .gte('observed_at', since.toISOString())
        .order('observed_at', { ascending: true })
        .range(from, to)
    );

    const observations = rows
      .map(toOpportunityInput)
      .filter((row): row is OpportunityInput => row !== null);
    return latestByIdentity(observations);
  }

  async fetchHistory(identities: string[]): Promise<Map<string, HistorySnapshot[]>> {
    const history = new Map<string, HistorySnapshot[]>();

    for (const batch of chunk(identities, this.batchSize)) {
      const rows = await this.fetchAllPages('history', (from, to) =>
        this.client
          .from('betting_data')
          .select('identity, observed_at, ev_percent, odds, line')
          .in('identity', batch)
          .order('observed_at', { ascending: true })
          .range(from, to)
      );

      for (const row of rows) {
        if (!isRecord(row)) continue;
        const identity = text(row, 'identity');
        const observedAt = text(row, 'observed_at');
        if (!identity || !observedAt) continue;

        const snapshots = history.get(identity) ?? [];
        snapshots.push({
          observed_at: observedAt,
          ev_percent: toNumber(row.ev_percent),
          odds: toNumber(row.odds),
          line: nullableText(row, 'line'),
        });
        history.set(identity, snapshots);
      }
    }

    return history;
  }

  async fetchConcludedUnresolved(before: Date, since: Date): Promise<ResolutionRequest[]> {
    const rows = await this.fetchAllPages('concluded observations', (from, to) =>
      this.client
        .from('betting_data')
        .select('*')
        .lt('event_start_time', before.toISOString())
        .gte('event_start_time', since.toISOString())
        .order('observed_at', { ascending: true })
        .range(from, to)
    );

    const concluded = latestByIdentity(
      rows.map(toOpportunityInput).filter((row): row is OpportunityInput => row !== null)
    );

    const settled = new Set<string>();
    for (const batch of chunk(concluded.map(o => o.identity), this.batchSize)) {
      const { data, error } = await this.client
        .from('bet_outcome_evaluation')
        .select('identity, outcome')
        .in('identity', batch);

      if (error) {
        throw new Error(`Error fetching outcomes: ${error.message}`);
      }

      for (const row of data ?? []) {
        if (!isRecord(row)) continue;
        const outcome = row.outcome;
        if (isOutcomeTag(outcome) && TERMINAL_OUTCOMES.includes(outcome)) {
          settled.add(text(row, 'identity'));
        }
      }
    }

    return concluded
      .filter(opportunity => !settled.has(opportunity.identity))
      .map(opportunity => ({
        identity: opportunity.identity,
        event_identity: opportunity.event_identity,
        event_start_time: opportunity.event_start_time,
        description: opportunity.description,
        bet_category: opportunity.bet_category,
      }));
  }

  async fetchCorpus(eventDates: string[]): Promise<CorpusRow[]> {
    if (eventDates.length === 0) return [];

    const rows = await this.fetchAllPages('corpus', (from, to) =>
      this.client
        .from('game_stats')
        .select('event_identity, event_date, team, subject_name, stat_category, stat_value')
        .in('event_date', eventDates)
        .order('id', { ascending: true })
        .range(from, to)
    );

    return rows.map(toCorpusRow).filter((row): row is CorpusRow => row !== null);
  }

  async fetchRecentOutcomes(limit: number): Promise<OutcomeTag[]> {
    const { data, error } = await this.client
      .from('bet_outcome_evaluation')
      .select('outcome')
      .order('evaluated_at', { ascending: false })
      .limit(limit);

    if (error) {
      throw new Error(`Error fetching recent outcomes: ${error.message}`);
    }

    const outcomes: OutcomeTag[] = [];
    for (const row of data ?? []) {
      const outcome: unknown = isRecord(row) ? row.outcome : null;
      if (isOutcomeTag(outcome)) outcomes.push(outcome);
    }
    return outcomes;
  }

  async saveGrades(records: GradeRecord[]): Promise<void> {
    await this.upsertBatches('bet_grades', records, 'identity,evaluated_at');
    this.logger.info(`Saved ${records.length} grades`);
  }

  async saveOutcomes(records: ResolutionRecord[]): Promise<void> {
    await this.upsertBatches('bet_outcome_evaluation', records, 'identity');
    this.logger.info(`Saved ${records.length} outcomes`);
  }
}
