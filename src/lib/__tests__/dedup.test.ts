/**
 * Unit tests for canonical-bet selection
 */

import { canonicalGroupKey, compareCandidates, selectCanonicalOpportunities, timingBucket } from '../dedup';
import type { OpportunityInput } from '../../types/opportunity';

const START = '2024-11-21T00:00:00Z';

function minutesBefore(minutes: number): string {
  return new Date(Date.parse(START) - minutes * 60000).toISOString();
}

function opportunity(identity: string, description: string, ev: number, minutesToStart = 25): OpportunityInput {
  return {
    identity,
    current_ev_percent: ev,
    current_odds: -110,
    current_line: null,
    event_identity: 'Grizzlies vs Pelicans',
    event_start_time: START,
    observed_at: minutesBefore(minutesToStart),
    sport: 'basketball',
    league: 'NBA',
    sportsbook: 'book-a',
    description,
    bet_category: 'Player Props',
  };
}

describe('Canonical bet selection', () => {
  describe('timingBucket', () => {
    it('should prefer 20-30 minutes before the start, then earlier, then later', () => {
      expect(timingBucket(20)).toBe(0);
      expect(timingBucket(30)).toBe(0);
      expect(timingBucket(31)).toBe(1);
      expect(timingBucket(19)).toBe(2);
      expect(timingBucket(null)).toBe(2);
    });
  });

  describe('compareCandidates', () => {
    it('should prefer fewer stat components over higher EV', () => {
      const combo = opportunity('a', 'Jaren Jackson Jr. Points + Rebounds Over 28.5', 9);
      const single = opportunity('b', 'Jaren Jackson Jr. Points Over 18.5', 5);

      expect(compareCandidates(single, combo)).toBeLessThan(0);
      expect(compareCandidates(combo, single)).toBeGreaterThan(0);
    });

    it('should prefer higher EV among equally simple bets', () => {
      const points = opportunity('b', 'Jaren Jackson Jr. Points Over 18.5', 5);
      const rebounds = opportunity('c', 'Jaren Jackson Jr. Rebounds Over 7.5', 6);

      expect(compareCandidates(rebounds, points)).toBeLessThan(0);
    });

    it('should prefer the 20-30 minute window when EV ties', () => {
      const inWindow = opportunity('x', 'Jaren Jackson Jr. Points Over 18.5', 5, 25);
      const early = opportunity('y', 'Jaren Jackson Jr. Points Over 18.5', 5, 45);
      const late = opportunity('z', 'Jaren Jackson Jr. Points Over 18.5', 5, 10);

      expect([late, early, inWindow].sort(compareCandidates).map(o => o.identity)).toEqual(['x', 'y', 'z']);
    });

    it('should prefer the candidate closer to 30 minutes within a bucket', () => {
      const closer = opportunity('far-id', 'Jaren Jackson Jr. Points Over 18.5', 5, 40);
      const further = opportunity('aa-id', 'Jaren Jackson Jr. Points Over 18.5', 5, 60);

      expect(compareCandidates(closer, further)).toBeLessThan(0);
    });

    it('should fall back to identity order', () => {
      const a = opportunity('a', 'Jaren Jackson Jr. Points Over 18.5', 5);
      const b = opportunity('b', 'Jaren Jackson Jr. Points Over 18.5', 5);

      expect(compareCandidates(a, b)).toBe(-1);
      expect(compareCandidates(b, a)).toBe(1);
      expect(compareCandidates(a, a)).toBe(0);
    });
  });

  describe('canonicalGroupKey', () => {
    it('should key by event and normalized subject', () => {
      expect(canonicalGroupKey(opportunity('a', 'Jaren Jackson Jr. Points Over 18.5', 5))).toBe(
        'Grizzlies vs Pelicans|jaren jackson jr'
      );
    });

    it('should fall back to the description for unparsed bets', () => {
      const moneyline = { ...opportunity('m', 'Grizzlies Moneyline', 3), bet_category: 'Moneyline' };
      expect(canonicalGroupKey(moneyline)).toBe('Grizzlies vs Pelicans|grizzlies moneyline');
    });
  });

  describe('selectCanonicalOpportunities', () => {
    it('should keep the best candidate per subject in first-seen order', () => {
      const selected = selectCanonicalOpportunities([
        opportunity('jjj-combo', 'Jaren Jackson Jr. Points + Rebounds Over 28.5', 9),
        opportunity('clarke-reb', 'Brandon Clarke Rebounds Under 6.5', 4),
        opportunity('jjj-pts', 'Jaren Jackson Jr. Points Over 18.5', 5),
        opportunity('jjj-reb', 'Jaren Jackson Jr. Rebounds Over 7.5', 6),
      ]);

      expect(selected.map(o => o.identity)).toEqual(['jjj-reb', 'clarke-reb']);
    });

    it('should return an empty list for no input', () => {
      expect(selectCanonicalOpportunities([])).toEqual([]);
    });
  });
});
