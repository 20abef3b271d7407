/**
 * Stat categories the resolver understands and the phrases that name them
 */

export type PrimitiveStat =
  | 'points'
  | 'rebounds'
  | 'assists'
  | 'steals'
  | 'blocks'
  | 'turnovers'
  | 'made_threes';

export const STAT_LABELS: Record<PrimitiveStat, string> = {
  points: 'Points',
  rebounds: 'Rebounds',
  assists: 'Assists',
  steals: 'Steals',
  blocks: 'Blocks',
  turnovers: 'Turnovers',
  made_threes: 'Made Threes',
};

/** Phrases as they appear in bet descriptions and categories, lower case */
export const STAT_KEYWORDS: Record<string, PrimitiveStat> = {
  'points': 'points',
  'pts': 'points',
  'rebounds': 'rebounds',
  'rebs': 'rebounds',
  'reb': 'rebounds',
  'assists': 'assists',
  'asts': 'assists',
  'ast': 'assists',
  'steals': 'steals',
  'stl': 'steals',
  'blocks': 'blocks',
  'blk': 'blocks',
  'turnovers': 'turnovers',
  'made threes': 'made_threes',
  'threes made': 'made_threes',
  'three pointers made': 'made_threes',
  '3-pointers made': 'made_threes',
  '3 pointers made': 'made_threes',
  '3pt made': 'made_threes',
};

/** Categories that imply a stat without naming it */
export const CATEGORY_ALIASES: Array<{ pattern: RegExp; stats: PrimitiveStat[] }> = [
  { pattern: /\bteam total\b/i, stats: ['points'] },
];

/** Stats counted towards double-doubles and triple-doubles */
export const MILESTONE_STATS: readonly PrimitiveStat[] = ['points', 'rebounds', 'assists', 'steals', 'blocks'];

/**
 * Map a corpus category ("Rebounds", "made_threes", "3PT Made") to a primitive stat
 */
export function toPrimitiveStat(category: string): PrimitiveStat | null {
  const key = category.trim().toLowerCase().replace(/_/g, ' ').replace(/\s+/g, ' ');
  return STAT_KEYWORDS[key] ?? null;
}

export function statLabel(stats: readonly PrimitiveStat[]): string {
  return stats.map(stat => STAT_LABELS[stat]).join(' + ');
}
