export const CERTIFICATION_WEIGHT = 50;
export const ANALYSIS_WEIGHT = 10;
export const COUNSELING_WEIGHT = 5;

export interface NorwoodStanding {
  username: string;
  stages: readonly number[];
}

export interface NorwoodEntry {
  username: string;
  norwoodStage: number;
}

export interface ActivityCounts {
  username: string;
  certifications: number;
  analyses: number;
  sessions: number;
}

export interface InsecurityEntry {
  username: string;
  score: number;
}

export type NorwoodOrder = 'best' | 'worst';

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('median of an empty list');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? sorted[middle]
    : (sorted[middle - 1] + sorted[middle]) / 2;
}

/**
 * Ranks users by the median of their analysed stages, lowest first for
 * "best" and highest first for "worst". Users with more analyses win
 * ties. Users without stages are left out.
 */
export function rankByNorwood(
  standings: readonly NorwoodStanding[],
  order: NorwoodOrder,
  limit: number,
): NorwoodEntry[] {
  const direction = order === 'best' ? 1 : -1;

  return standings
    .filter((standing) => standing.stages.length > 0)
    .map((standing) => ({
      username: standing.username,
      median: median(standing.stages),
      count: standing.stages.length,
    }))
    .sort((a, b) => direction * (a.median - b.median) || b.count - a.count)
    .slice(0, limit)
    .map(({ username, median: stage }) => ({
      username,
      norwoodStage: Math.round(stage),
    }));
}

export function insecurityScore(counts: ActivityCounts): number {
  return (
    counts.certifications * CERTIFICATION_WEIGHT +
    counts.analyses * ANALYSIS_WEIGHT +
    counts.sessions * COUNSELING_WEIGHT
  );
}

/** Highest score first; users who never used a paid feature are omitted. */
export function rankByInsecurity(
  activity: readonly ActivityCounts[],
  limit: number,
): InsecurityEntry[] {
  return activity
    .map((counts) => ({ username: counts.username, score: insecurityScore(counts) }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}
