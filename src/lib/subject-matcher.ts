/**
 * Name matching between parsed bet subjects and result-corpus names
 */

export type MatchMethod = 'exact' | 'contains' | 'initials';

export type SubjectMatch =
  | { kind: 'matched'; subject: string; method: MatchMethod }
  | { kind: 'ambiguous'; candidates: string[] }
  | { kind: 'none' };

/**
 * "Nikola Jokić" → "nikola jokic", "P.J. Washington Jr." → "pj washington jr"
 */
export function normalizeName(name: string): string {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/['’.]/g, '')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

const NAME_SUFFIXES = new Set(['jr', 'sr', 'ii', 'iii', 'iv']);

function containsTokens(a: string, b: string): boolean {
  return ` ${b} `.includes(` ${a} `) || ` ${a} `.includes(` ${b} `);
}

/**
 * Candidate contains the query, or the query adds nothing but a name suffix.
 * "LeBron James 1st Quarter" must not fall back to "LeBron James".
 */
function containsSubject(query: string, candidate: string): boolean {
  if (` ${candidate} `.includes(` ${query} `)) return true;
  if (!` ${query} `.includes(` ${candidate} `)) return false;

  const extra = ` ${query} `.replace(` ${candidate} `, ' ').split(' ').filter(token => token !== '');
  return extra.every(token => NAME_SUFFIXES.has(token));
}

function initialsMatch(query: string, candidate: string): boolean {
  const q = query.split(' ');
  const c = candidate.split(' ');
  if (q.length !== c.length || q.length < 2) return false;
  if (q[q.length - 1] !== c[c.length - 1]) return false;

  return q.every((token, i) => {
    const other = c[i];
    if (token === other) return true;
    if (token.length === 1) return other.startsWith(token);
    if (other.length === 1) return token.startsWith(other);
    return false;
  });
}

const TIERS: Array<{ method: MatchMethod; test: (query: string, candidate: string) => boolean }> = [
  { method: 'exact', test: (q, c) => q === c },
  { method: 'contains', test: containsSubject },
  { method: 'initials', test: initialsMatch },
];

/**
 * Tiered match: exact, then whole-token containment, then initials.
 * Extra query tokens are tolerated only when they are name suffixes.
 * The first tier with any hit decides; more than one distinct hit is ambiguous.
 */
export function matchSubject(query: string, candidates: readonly string[]): SubjectMatch {
  const normalizedQuery = normalizeName(query);
  if (!normalizedQuery) return { kind: 'none' };

  // distinct normalized names, keeping the first spelling seen
  const distinct = new Map<string, string>();
  for (const candidate of candidates) {
    const key = normalizeName(candidate);
    if (key && !distinct.has(key)) distinct.set(key, candidate);
  }

  for (const tier of TIERS) {
    const hits = [...distinct.entries()].filter(([key]) => tier.test(normalizedQuery, key));
    if (hits.length === 1) {
      return { kind: 'matched', subject: hits[0][1], method: tier.method };
    }
    if (hits.length > 1) {
      return { kind: 'ambiguous', candidates: hits.map(([, name]) => name).sort() };
    }
  }

  return { kind: 'none' };
}

/**
 * "Grizzlies vs Pelicans" / "Grizzlies @ Pelicans" → both sides, or null
 */
export function splitEventTeams(eventIdentity: string): [string, string] | null {
  const parts = eventIdentity.split(/\s+(?:vs\.?|v\.?|@|at)\s+/i);
  if (parts.length !== 2) return null;

  const [home, away] = parts.map(part => part.trim());
  if (!home || !away) return null;
  return [home, away];
}

/**
 * Team names agree when one contains the other as whole tokens
 */
export function teamMatches(side: string, team: string): boolean {
  const a = normalizeName(side);
  const b = normalizeName(team);
  return a !== '' && b !== '' && containsTokens(a, b);
}
