/**
 * Free-text bet description → resolution condition.
 *
 * Period-scoped lines (quarters, halves) are rejected up front: the result
 * corpus only carries full-game values.
 *
 * Grammar, tried in order:
 *   1. milestone      "<subject> Double Double [Yes|No]"
 *   2. stat phrase    "<subject> <stat> [+ <stat>]* (Over|Under) <n>" or "... <stat> [Exactly] <n>"
 *   3. category stat  description "<subject> (Over|Under) <n>", stat named by the bet category
 * Combined phrases are matched before single keywords and longer keywords
 * before shorter ones.
 */

import {
  CATEGORY_ALIASES,
  MILESTONE_STATS,
  STAT_KEYWORDS,
  statLabel,
  type PrimitiveStat,
} from './stats';

export type Comparator = 'over' | 'under' | 'exact';

export interface StatSpec {
  label: string;
  components: PrimitiveStat[];
  /** `sum` adds the components; `double-digits` counts components of 10 or more */
  aggregate: 'sum' | 'double-digits';
}

export interface ResolutionCondition {
  subject: string;
  stat: StatSpec;
  comparator: Comparator;
  threshold: number;
  statSource: 'description' | 'category';
}

export type ParseFailureReason =
  | 'empty-description'
  | 'period-scoped'
  | 'no-stat-keyword'
  | 'missing-comparator'
  | 'missing-threshold'
  | 'missing-subject';

export type ParseResult =
  | { ok: true; condition: ResolutionCondition }
  | { ok: false; reason: ParseFailureReason; detail: string; subject: string | null };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const KEYWORD_PATTERN = `(?:${Object.keys(STAT_KEYWORDS)
  .sort((a, b) => b.length - a.length)
  .map(k => escapeRegExp(k).replace(/ /g, '\\s+'))
  .join('|')})`;

const STAT_PHRASE = new RegExp(
  `(?<![a-z0-9])(${KEYWORD_PATTERN}(?:\\s*[+&]\\s*${KEYWORD_PATTERN})*)(?![a-z0-9])`,
  'i'
);
const MILESTONE = /\b(double|triple)[\s-]double\b/i;
const MILESTONE_STRIP = /\b(?:player\s+)?(?:double|triple)[\s-]double\b/gi;
const YES_NO_SUFFIX = /\s+(yes|no)\s*$/i;
const OVER_UNDER = /\b(over|under)\b(?:\s*(\d*\.?\d+))?/gi;
const BARE_NUMBER = /(?:\bexactly\s+)?(\d*\.?\d+)\s*$/i;
const EXACTLY_NUMBER = /\bexactly\s+(\d*\.?\d+)\s*$/i;
const PERIOD_SCOPE =
  /\b(?:(?:1st|2nd|3rd|4th|first|second|third|fourth)\s+(?:quarter|qtr|half|period)|[1-4]q|q[1-4]|[12]h|h[12]|period)\b/i;

function cleanSubject(text: string): string {
  return text.replace(/\s+/g, ' ').replace(/[\s\-:,]+$/, '').trim();
}

/**
 * Components named by a matched stat phrase, in order, without repeats
 */
export function phraseComponents(phrase: string): PrimitiveStat[] {
  const components: PrimitiveStat[] = [];
  for (const part of phrase.split(/[+&]/)) {
    const stat = STAT_KEYWORDS[part.trim().toLowerCase().replace(/\s+/g, ' ')];
    if (stat && !components.includes(stat)) components.push(stat);
  }
  return components;
}

/**
 * First stat phrase in the text, combined phrases preferred
 */
export function findStatPhrase(text: string): { index: number; length: number; components: PrimitiveStat[] } | null {
  const match = STAT_PHRASE.exec(text);
  if (!match) return null;

  const components = phraseComponents(match[1]);
  if (components.length === 0) return null;
  return { index: match.index, length: match[0].length, components };
}

type ClauseResult =
  | { found: true; comparator: Comparator; threshold: number; index: number }
  | { found: false; reason: 'missing-threshold'; index: number }
  | { found: false; reason: 'missing-comparator' };

/**
 * The last Over/Under clause in the text, or a trailing exact value
 */
export function readComparatorClause(text: string, allowBareNumber: boolean): ClauseResult {
  const matches = [...text.matchAll(OVER_UNDER)];
  const last = matches[matches.length - 1];

  if (last) {
    if (last[2] === undefined) return { found: false, reason: 'missing-threshold', index: last.index ?? 0 };
    return {
      found: true,
      comparator: last[1].toLowerCase() === 'over' ? 'over' : 'under',
      threshold: parseFloat(last[2]),
      index: last.index ?? 0,
    };
  }

  const exact = (allowBareNumber ? BARE_NUMBER : EXACTLY_NUMBER).exec(text);
  if (exact) {
    return { found: true, comparator: 'exact', threshold: parseFloat(exact[1]), index: exact.index };
  }

  return { found: false, reason: 'missing-comparator' };
}

function parseMilestone(description: string, betCategory: string): ParseResult | null {
  const named = MILESTONE.exec(description) ?? MILESTONE.exec(betCategory);
  if (!named) return null;

  const required = named[1].toLowerCase() === 'triple' ? 3 : 2;
  const answer = YES_NO_SUFFIX.exec(description);
  const subject = cleanSubject(description.replace(MILESTONE_STRIP, ' ').replace(YES_NO_SUFFIX, ''));

  if (!subject) {
    return { ok: false, reason: 'missing-subject', detail: `No subject before "${named[0]}"`, subject: null };
  }

  return {
    ok: true,
    condition: {
      subject,
      stat: {
        label: required === 3 ? 'Triple Double' : 'Double Double',
        components: [...MILESTONE_STATS],
        aggregate: 'double-digits',
      },
      comparator: answer && answer[1].toLowerCase() === 'no' ? 'under' : 'over',
      threshold: required - 0.5,
      statSource: MILESTONE.test(description) ? 'description' : 'category',
    },
  };
}

/**
 * "LeBron James 1st Quarter Points Over 8.5" or category "1st Half Player Points"
 */
function parsePeriodScope(description: string, betCategory: string): ParseResult | null {
  const inDescription = PERIOD_SCOPE.exec(description);
  const scope = inDescription ?? PERIOD_SCOPE.exec(betCategory);
  if (!scope) return null;

  const subject = inDescription ? cleanSubject(description.slice(0, inDescription.index)) : null;
  return {
    ok: false,
    reason: 'period-scoped',
    detail: `"${scope[0]}" line cannot be settled from full-game stats`,
    subject: subject || null,
  };
}

function categoryComponents(betCategory: string): PrimitiveStat[] {
  const phrase = findStatPhrase(betCategory);
  if (phrase) return phrase.components;

  for (const alias of CATEGORY_ALIASES) {
    if (alias.pattern.test(betCategory)) return [...alias.stats];
  }
  return [];
}

function failure(reason: ParseFailureReason, detail: string, subject: string | null = null): ParseResult {
  return { ok: false, reason, detail, subject };
}

export function parseDescription(description: string, betCategory = ''): ParseResult {
  const text = description.replace(/\s+/g, ' ').trim();
  if (!text) return failure('empty-description', 'Description is empty');

  const period = parsePeriodScope(text, betCategory);
  if (period) return period;

  const milestone = parseMilestone(text, betCategory);
  if (milestone) return milestone;

  // Stat named in the description: subject is everything before it
  const phrase = findStatPhrase(text);
  if (phrase) {
    const subject = cleanSubject(text.slice(0, phrase.index));
    const clause = readComparatorClause(text.slice(phrase.index + phrase.length), true);

    if (!subject) return failure('missing-subject', `No subject before the stat in "${text}"`);
    if (!clause.found) return failure(clause.reason, `No usable Over/Under clause in "${text}"`, subject);

    return {
      ok: true,
      condition: {
        subject,
        stat: { label: statLabel(phrase.components), components: phrase.components, aggregate: 'sum' },
        comparator: clause.comparator,
        threshold: clause.threshold,
        statSource: 'description',
      },
    };
  }

  // Stat named only by the category: subject is the description minus its clause
  const clause = readComparatorClause(text, false);
  const subject = cleanSubject('index' in clause ? text.slice(0, clause.index) : text);
  const components = categoryComponents(betCategory);

  if (components.length === 0) {
    return failure('no-stat-keyword', `No stat keyword in "${text}" or category "${betCategory}"`, subject || null);
  }
  if (!clause.found) return failure(clause.reason, `No usable Over/Under clause in "${text}"`, subject || null);
  if (!subject) return failure('missing-subject', `No subject before the clause in "${text}"`);

  return {
    ok: true,
    condition: {
      subject,
      stat: { label: statLabel(components), components, aggregate: 'sum' },
      comparator: clause.comparator,
      threshold: clause.threshold,
      statSource: 'category',
    },
  };
}

export function describeCondition(condition: ResolutionCondition): string {
  const comparator = condition.comparator === 'exact' ? 'Exactly' : condition.comparator === 'over' ? 'Over' : 'Under';
  return `${condition.subject} ${condition.stat.label} ${comparator} ${condition.threshold}`;
}
