/**
 * Canonical-bet selection: several lines on the same subject in the same event
 * are correlated, so only one of them is kept per cycle.
 */

import { differenceInMilliseconds } from 'date-fns';
import { parseDescription } from './description-parser';
import { toDate, toNumber } from './scoring';
import { normalizeName } from './subject-matcher';
import type { OpportunityInput } from '../types/opportunity';

// Preferred entry window before the start, in minutes
export const PREFERRED_WINDOW = { from: 20, to: 30 };

interface CandidateFacts {
  components: number;
  ev: number;
  minutesToStart: number | null;
  subject: string;
}

function factsFor(opportunity: OpportunityInput): CandidateFacts {
  const parsed = parseDescription(opportunity.description, opportunity.bet_category);
  const observedAt = toDate(opportunity.observed_at);
  const eventStart = toDate(opportunity.event_start_time);

  let subject = opportunity.description;
  if (parsed.ok) {
    subject = parsed.condition.subject;
  } else if (parsed.subject) {
    subject = parsed.subject;
  }

  return {
    components: parsed.ok ? parsed.condition.stat.components.length : 1,
    ev: toNumber(opportunity.current_ev_percent) ?? Number.NEGATIVE_INFINITY,
    minutesToStart: observedAt && eventStart ? differenceInMilliseconds(eventStart, observedAt) / 60000 : null,
    subject,
  };
}

/**
 * 0 inside the preferred window, 1 earlier than it, 2 later or unknown
 */
export function timingBucket(minutesToStart: number | null): number {
  if (minutesToStart === null) return 2;
  if (minutesToStart >= PREFERRED_WINDOW.from && minutesToStart <= PREFERRED_WINDOW.to) return 0;
  if (minutesToStart > PREFERRED_WINDOW.to) return 1;
  return 2;
}

function compareFacts(a: CandidateFacts, b: CandidateFacts): number {
  if (a.components !== b.components) return a.components - b.components;
  if (a.ev !== b.ev) return b.ev > a.ev ? 1 : -1;

  const bucketA = timingBucket(a.minutesToStart);
  const bucketB = timingBucket(b.minutesToStart);
  if (bucketA !== bucketB) return bucketA - bucketB;

  const distanceA = a.minutesToStart === null ? Number.POSITIVE_INFINITY : Math.abs(a.minutesToStart - PREFERRED_WINDOW.to);
  const distanceB = b.minutesToStart === null ? Number.POSITIVE_INFINITY : Math.abs(b.minutesToStart - PREFERRED_WINDOW.to);
  if (distanceA !== distanceB) return distanceA < distanceB ? -1 : 1;

  return 0;
}

/**
 * Sort order for candidates on the same subject: simpler bet, higher EV,
 * better timing, then identity
 */
export function compareCandidates(a: OpportunityInput, b: OpportunityInput): number {
  const byFacts = compareFacts(factsFor(a), factsFor(b));
  if (byFacts !== 0) return byFacts;
  if (a.identity === b.identity) return 0;
  return a.identity < b.identity ? -1 : 1;
}

export function canonicalGroupKey(opportunity: OpportunityInput): string {
  return `${opportunity.event_identity}|${normalizeName(factsFor(opportunity).subject)}`;
}

/**
 * Best candidate per (event, subject), in first-seen group order
 */
export function selectCanonicalOpportunities(opportunities: OpportunityInput[]): OpportunityInput[] {
  const groups = new Map<string, OpportunityInput[]>();
  for (const opportunity of opportunities) {
    const key = canonicalGroupKey(opportunity);
    const group = groups.get(key);
    if (group) {
      group.push(opportunity);
    } else {
      groups.set(key, [opportunity]);
    }
  }

  return [...groups.values()].map(group => [...group].sort(compareCandidates)[0]);
}
