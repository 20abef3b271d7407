/**
 * Unit tests for outcome resolution against the result corpus
 */

import { ContractViolationError } from '../errors';
import { Logger, clearStoredLogs, getStoredLogs } from '../logger';
import { OutcomeResolver, evaluateCondition, findEventRows } from '../outcome-resolver';
import type { CorpusRow, ResolutionRequest } from '../../types/opportunity';

function row(subject: string, team: string, category: string, value: number | null, event = 'Grizzlies vs Pelicans'): CorpusRow {
  return {
    event_identity: event,
    event_date: '2024-11-20',
    team,
    subject_name: subject,
    stat_category: category,
    stat_value: value,
  };
}

const MEM = 'Memphis Grizzlies';
const NOP = 'New Orleans Pelicans';

const corpus: CorpusRow[] = [
  row('Brandon Clarke', MEM, 'Rebounds', 4),
  row('Brandon Clarke', MEM, 'Points', 8),
  row('Jaren Jackson Jr.', MEM, 'Points', 18),
  row('Jaren Jackson Jr.', MEM, 'Rebounds', 9),
  row('Jaren Jackson Jr.', MEM, 'Assists', 2),
  row('Jaylen Wells', MEM, 'Points', 12),
  row('Zion Williamson', NOP, 'Points', 22),
  row('Zion Williamson', NOP, 'Rebounds', 11),
  row('Zion Williamson', NOP, 'Assists', 6),
  row('Zion Williamson', NOP, 'Steals', 1),
  row('Zion Williamson', NOP, 'Blocks', 0),
  row('Zion Williamson', NOP, 'Turnovers', null),
];

function request(description: string, overrides: Partial<ResolutionRequest> = {}): ResolutionRequest {
  return {
    identity: 'bet-1',
    event_identity: 'Grizzlies vs Pelicans',
    event_start_time: '2024-11-21T01:00:00Z',
    description,
    bet_category: 'Player Props',
    ...overrides,
  };
}

describe('Outcome Resolver', () => {
  let resolver: OutcomeResolver;
  let consoleLogSpy: jest.SpyInstance;
  const evaluatedAt = new Date('2024-11-21T06:00:00Z');

  beforeEach(() => {
    clearStoredLogs();
    resolver = new OutcomeResolver({ logger: new Logger('test', 'warn') });
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.runOnlyPendingTimers();
    jest.useRealTimers();
    clearStoredLogs();
    consoleLogSpy.mockRestore();
  });

  describe('evaluateCondition', () => {
    it('should decide over and under lines', () => {
      expect(evaluateCondition(7, 'over', 6.5)).toBe('WIN');
      expect(evaluateCondition(6, 'over', 6.5)).toBe('LOSS');
      expect(evaluateCondition(6, 'under', 6.5)).toBe('WIN');
      expect(evaluateCondition(7, 'under', 6.5)).toBe('LOSS');
    });

    it('should push when the value lands on the line', () => {
      expect(evaluateCondition(6.5, 'over', 6.5)).toBe('TIE');
      expect(evaluateCondition(6.5, 'under', 6.5)).toBe('TIE');
      expect(evaluateCondition(0.1 + 0.2, 'over', 0.3)).toBe('TIE');
    });

    it('should decide exact lines', () => {
      expect(evaluateCondition(8, 'exact', 8)).toBe('WIN');
      expect(evaluateCondition(7, 'exact', 8)).toBe('LOSS');
    });
  });

  describe('decided outcomes', () => {
    it('should resolve a category-stat under as WIN', () => {
      const record = resolver.resolve(
        request('Brandon Clarke Under 6.5', { bet_category: 'Rebounds' }),
        corpus,
        evaluatedAt
      );

      expect(record).toEqual({
        identity: 'bet-1',
        evaluated_at: '2024-11-21T06:00:00.000Z',
        outcome: 'WIN',
        matched_value: 4,
        reason: 'Brandon Clarke Rebounds Under 6.5: Brandon Clarke recorded 4',
        reason_code: 'decided',
      });
    });

    it('should resolve a value on the line as TIE', () => {
      const onTheLine = corpus.map(r =>
        r.subject_name === 'Brandon Clarke' && r.stat_category === 'Rebounds' ? { ...r, stat_value: 6.5 } : r
      );
      const record = resolver.resolve(
        request('Brandon Clarke Under 6.5', { bet_category: 'Rebounds' }),
        onTheLine,
        evaluatedAt
      );

      expect(record.outcome).toBe('TIE');
      expect(record.matched_value).toBe(6.5);
    });

    it('should sum combined stats', () => {
      const record = resolver.resolve(request('Jaren Jackson Jr. Points + Rebounds Over 28.5'), corpus, evaluatedAt);

      expect(record.outcome).toBe('LOSS');
      expect(record.matched_value).toBe(27);
      expect(record.reason).toBe('Jaren Jackson Jr. Points + Rebounds Over 28.5: Jaren Jackson Jr. recorded 27');
    });

    it('should count double-digit stats for milestones', () => {
      const doubleDouble = resolver.resolve(request('Zion Williamson Double Double Yes'), corpus, evaluatedAt);
      const tripleDouble = resolver.resolve(request('Zion Williamson Triple Double Yes'), corpus, evaluatedAt);

      expect(doubleDouble.outcome).toBe('WIN');
      expect(doubleDouble.matched_value).toBe(2);
      expect(tripleDouble.outcome).toBe('LOSS');
    });

    it('should decide exact lines', () => {
      expect(resolver.resolve(request('Zion Williamson Assists 6'), corpus, evaluatedAt).outcome).toBe('WIN');
      expect(resolver.resolve(request('Zion Williamson Assists Exactly 5'), corpus, evaluatedAt).outcome).toBe('LOSS');
    });

    it('should match a shortened subject name', () => {
      const record = resolver.resolve(request('Jaren Jackson Assists Under 3.5'), corpus, evaluatedAt);
      expect(record.outcome).toBe('WIN');
      expect(record.matched_value).toBe(2);
    });

    it('should match a subject whose suffix the corpus leaves out', () => {
      const record = resolver.resolve(
        request('Gary Payton II Points Under 8.5'),
        [...corpus, row('Gary Payton', NOP, 'Points', 7)],
        evaluatedAt
      );

      expect(record.outcome).toBe('WIN');
      expect(record.matched_value).toBe(7);
      expect(record.reason).toBe('Gary Payton II Points Under 8.5: Gary Payton recorded 7');
    });

    it('should accept duplicate rows that agree', () => {
      const record = resolver.resolve(
        request('Brandon Clarke Rebounds Under 6.5'),
        [...corpus, row('Brandon Clarke', MEM, 'rebounds', 4)],
        evaluatedAt
      );
      expect(record.outcome).toBe('WIN');
    });

    it('should find the event by date and teams when identities differ', () => {
      const record = resolver.resolve(
        request('Brandon Clarke Rebounds Under 6.5', { event_identity: 'Memphis Grizzlies @ New Orleans Pelicans' }),
        corpus,
        evaluatedAt
      );
      expect(record.outcome).toBe('WIN');
    });

    it('should be idempotent', () => {
      const req = request('Jaren Jackson Jr. Points + Rebounds Over 28.5');
      const first = resolver.resolve(req, corpus, evaluatedAt);
      const second = resolver.resolve(req, corpus, evaluatedAt);

      expect(second).toEqual(first);
    });
  });

  describe('manual review', () => {
    it('should pend a subject missing from the corpus', () => {
      const record = resolver.resolve(request('Desmond Bane Points Over 20.5'), corpus, evaluatedAt);

      expect(record).toEqual({
        identity: 'bet-1',
        evaluated_at: '2024-11-21T06:00:00.000Z',
        outcome: 'PEND_MANUAL',
        matched_value: null,
        reason: 'No corpus match for subject "Desmond Bane" in Grizzlies vs Pelicans',
        reason_code: 'no-corpus-match',
      });
    });

    it('should pend an unparseable description', () => {
      const record = resolver.resolve(request('Grizzlies Moneyline', { bet_category: 'Moneyline' }), corpus, evaluatedAt);

      expect(record.outcome).toBe('PEND_MANUAL');
      expect(record.reason_code).toBe('unparseable-description');
      expect(record.reason).toBe(
        'Could not parse "Grizzlies Moneyline": No stat keyword in "Grizzlies Moneyline" or category "Moneyline"'
      );
    });

    it('should pend a quarter line instead of settling it on full-game stats', () => {
      const record = resolver.resolve(
        request('LeBron James 1st Quarter Points Over 8.5'),
        [...corpus, row('LeBron James', 'Los Angeles Lakers', 'Points', 30)],
        evaluatedAt
      );

      expect(record).toEqual({
        identity: 'bet-1',
        evaluated_at: '2024-11-21T06:00:00.000Z',
        outcome: 'PEND_MANUAL',
        matched_value: null,
        reason:
          'Could not parse "LeBron James 1st Quarter Points Over 8.5": "1st Quarter" line cannot be settled from full-game stats',
        reason_code: 'period-scoped',
      });
    });

    it('should pend a half line named by the category', () => {
      const record = resolver.resolve(
        request('LeBron James Over 15.5', { bet_category: '1st Half Player Points' }),
        [...corpus, row('LeBron James', 'Los Angeles Lakers', 'Points', 30)],
        evaluatedAt
      );

      expect(record.outcome).toBe('PEND_MANUAL');
      expect(record.matched_value).toBeNull();
      expect(record.reason_code).toBe('period-scoped');
    });

    it('should pend a subject carrying extra words', () => {
      const record = resolver.resolve(request('Brandon Clarke Memphis Rebounds Under 6.5'), corpus, evaluatedAt);

      expect(record.reason_code).toBe('no-corpus-match');
      expect(record.reason).toBe('No corpus match for subject "Brandon Clarke Memphis" in Grizzlies vs Pelicans');
    });

    it('should pend an event missing from the corpus', () => {
      const record = resolver.resolve(
        request('Brandon Clarke Rebounds Under 6.5', { event_identity: 'Lakers vs Celtics' }),
        corpus,
        evaluatedAt
      );

      expect(record.reason_code).toBe('no-corpus-event');
      expect(record.reason).toBe('No corpus event for Lakers vs Celtics');
    });

    it('should pend when several corpus events fit', () => {
      const doubleHeader = [
        row('Brandon Clarke', MEM, 'Rebounds', 4, 'game-1'),
        row('Zion Williamson', NOP, 'Points', 22, 'game-1'),
        row('Brandon Clarke', MEM, 'Rebounds', 7, 'game-2'),
        row('Zion Williamson', NOP, 'Points', 30, 'game-2'),
      ];
      const record = resolver.resolve(request('Brandon Clarke Rebounds Under 6.5'), doubleHeader, evaluatedAt);

      expect(record.reason_code).toBe('ambiguous-event');
      expect(record.reason).toBe('Several corpus events match Grizzlies vs Pelicans: game-1, game-2');
    });

    it('should pend an ambiguous subject', () => {
      const record = resolver.resolve(
        request('J. Wells Points Over 10.5'),
        [...corpus, row('Jordan Wells', NOP, 'Points', 3)],
        evaluatedAt
      );

      expect(record.reason_code).toBe('ambiguous-subject');
      expect(record.reason).toBe('Subject "J. Wells" matches several corpus names: Jaylen Wells, Jordan Wells');
    });

    it('should pend a stat that was not recorded', () => {
      const missing = resolver.resolve(request('Brandon Clarke Assists Over 1.5'), corpus, evaluatedAt);
      const nullValue = resolver.resolve(request('Zion Williamson Turnovers Under 2.5'), corpus, evaluatedAt);

      expect(missing.reason_code).toBe('stat-not-recorded');
      expect(missing.reason).toBe('No Assists recorded for Brandon Clarke');
      expect(nullValue.reason_code).toBe('stat-not-recorded');
    });

    it('should pend conflicting values', () => {
      const record = resolver.resolve(
        request('Brandon Clarke Rebounds Under 6.5'),
        [...corpus, row('Brandon Clarke', MEM, 'Rebounds', 5)],
        evaluatedAt
      );

      expect(record.reason_code).toBe('conflicting-values');
      expect(record.reason).toBe('Conflicting Rebounds values for Brandon Clarke: 4, 5');
    });

    it('should log each manual review', () => {
      resolver.resolve(request('Desmond Bane Points Over 20.5', { identity: 'bet-77' }), corpus, evaluatedAt);

      const logs = getStoredLogs({ level: 'warn' });
      expect(logs).toHaveLength(1);
      expect(logs[0].message).toContain('Manual review: bet-77');
    });
  });

  describe('contract violations', () => {
    it('should reject requests without identities', () => {
      expect(() => resolver.resolve(request('Brandon Clarke Under 6.5', { identity: '' }), corpus)).toThrow(
        ContractViolationError
      );
      expect(() => resolver.resolve(request('Brandon Clarke Under 6.5', { event_identity: ' ' }), corpus)).toThrow(
        ContractViolationError
      );
    });
  });

  describe('findEventRows', () => {
    it('should not fall back without a start time', () => {
      const lookup = findEventRows(
        request('Brandon Clarke Under 6.5', { event_identity: 'Grizzlies @ Pelicans', event_start_time: null }),
        corpus
      );
      expect(lookup).toEqual({ kind: 'none' });
    });

    it('should ignore corpus events on other dates', () => {
      const lookup = findEventRows(
        request('Brandon Clarke Under 6.5', {
          event_identity: 'Grizzlies @ Pelicans',
          event_start_time: '2024-11-25T01:00:00Z',
        }),
        corpus
      );
      expect(lookup).toEqual({ kind: 'none' });
    });
  });
});
