import type { PipelineSettings, SentimentLabel, SentimentWeights } from '../types.js';

/**
 * Label order used everywhere counts are printed or iterated.
 */
export const SENTIMENT_LABELS = ['positive', 'neutral', 'negative'] as const satisfies readonly SentimentLabel[];

/**
 * Default weights reduce the composite to (positive - negative) / total.
 */
export const DEFAULT_SENTIMENT_WEIGHTS: SentimentWeights = {
  positive: 1,
  neutral: 0,
  negative: -1,
};

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  windowLengthDays: 7,
  spikeBaselineDays: 3,
  spikeThresholdRatio: 1.2,
  spikeMinScore: 0,
  sentimentWeights: DEFAULT_SENTIMENT_WEIGHTS,
  sentimentNeutralBand: 0.1,
  headlineLimit: 3,
};

/**
 * Blend for the overall winner: interest normalised against the window leader,
 * sentiment mapped from -1..1 onto 0..1.
 */
export const COMBINED_SCORE_WEIGHTS = {
  interest: 0.7,
  sentiment: 0.3,
} as const;

/** Region served by the top-level entity set and report directory. */
export const DEFAULT_REGION = 'national';
