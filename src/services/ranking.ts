import type { EntityId, RankedEntity, WindowSummary } from '../types.js';
import { COMBINED_SCORE_WEIGHTS } from '../constants/pipeline.js';
import { round1, round3 } from '../utils/normalize.js';

/**
 * Total order for the ranking: average desc, then peak desc, then entity id.
 * Ids compare by code unit so the order never depends on locale.
 */
export function compareSummaries(a: WindowSummary, b: WindowSummary): number {
  if (a.average !== b.average) return b.average - a.average;
  if (a.peak !== b.peak) return b.peak - a.peak;
  return a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0;
}

/**
 * Percent change of the window average against the previous window's average.
 * Null when there is no previous average to compare with.
 */
export function momentumPct(current: number, previous: number | undefined): number | null {
  if (previous === undefined || previous <= 0) return null;
  return round1(((current - previous) / previous) * 100);
}

/**
 * 0.7 x (average / best average in the window) + 0.3 x ((composite + 1) / 2), to three decimals.
 */
export function combinedScore(average: number, composite: number, maxAverage: number): number {
  const interest = maxAverage > 0 ? average / maxAverage : 0;
  const sentiment = (composite + 1) / 2;
  return round3(COMBINED_SCORE_WEIGHTS.interest * interest + COMBINED_SCORE_WEIGHTS.sentiment * sentiment);
}

/**
 * Highest combined score; ties go to the better-ranked entity.
 */
export function overallWinner(ranking: readonly RankedEntity[]): RankedEntity | undefined {
  return ranking.reduce<RankedEntity | undefined>(
    (best, r) => (best === undefined || r.combinedScore > best.combinedScore ? r : best),
    undefined,
  );
}

export function rankEntities(
  summaries: readonly WindowSummary[],
  nameOf: (id: EntityId) => string,
  previousAverages: ReadonlyMap<EntityId, number> = new Map(),
): RankedEntity[] {
  const maxAverage = Math.max(0, ...summaries.map((s) => s.average));
  return [...summaries].sort(compareSummaries).map((s, index) => ({
    rank: index + 1,
    entityId: s.entityId,
    name: nameOf(s.entityId),
    average: s.average,
    peak: s.peak,
    peakDate: s.peakDate,
    low: s.low,
    composite: s.composite,
    momentumPct: momentumPct(s.average, previousAverages.get(s.entityId)),
    combinedScore: combinedScore(s.average, s.composite, maxAverage),
  }));
}
