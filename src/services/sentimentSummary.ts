import type {
  DailyRecord,
  DateRange,
  EntityId,
  SentimentCounts,
  SentimentSummary,
  SentimentWeights,
  WindowSummary,
} from '../types.js';
import { DEFAULT_SENTIMENT_WEIGHTS, SENTIMENT_LABELS } from '../constants/pipeline.js';
import { clamp } from '../utils/normalize.js';
import { aggregateScores, recordsInRange } from './aggregator.js';

export function emptyCounts(): SentimentCounts {
  return { positive: 0, neutral: 0, negative: 0 };
}

/**
 * Weighted net positivity: sum(weight * count) / total, in [-1, 1].
 * With the default weights this is (positive - negative) / total.
 * Returns exactly 0 when there are no labels.
 */
export function compositeScore(counts: SentimentCounts, weights: SentimentWeights = DEFAULT_SENTIMENT_WEIGHTS): number {
  const total = SENTIMENT_LABELS.reduce((acc, label) => acc + counts[label], 0);
  if (total === 0) return 0;
  const weighted = SENTIMENT_LABELS.reduce((acc, label) => acc + weights[label] * counts[label], 0);
  return clamp(weighted / total, -1, 1);
}

export function summarizeSentiment(
  entityId: EntityId,
  range: DateRange,
  records: readonly DailyRecord[],
  weights: SentimentWeights = DEFAULT_SENTIMENT_WEIGHTS,
): SentimentSummary {
  const counts = emptyCounts();
  let total = 0;
  for (const record of recordsInRange(entityId, range, records)) {
    for (const headline of record.headlines) {
      counts[headline.sentiment] += 1;
      total += 1;
    }
  }

  return {
    entityId,
    range: { ...range },
    counts,
    total,
    composite: compositeScore(counts, weights),
  };
}

/**
 * Score statistics and sentiment tallies for one entity over one window.
 * Throws InsufficientData (from the aggregator) when no day in range has a score.
 */
export function buildWindowSummary(
  entityId: EntityId,
  range: DateRange,
  records: readonly DailyRecord[],
  weights: SentimentWeights = DEFAULT_SENTIMENT_WEIGHTS,
): WindowSummary {
  const scores = aggregateScores(entityId, range, records);
  const sentiment = summarizeSentiment(entityId, range, records, weights);
  return {
    ...scores,
    sentimentCounts: sentiment.counts,
    totalHeadlines: sentiment.total,
    composite: sentiment.composite,
  };
}
