import Sentiment from 'sentiment';
import type { SentimentLabel } from '../types.js';
import { normalizeHeadline } from '../utils/normalize.js';

const analyzer = new Sentiment();

// Same cut-offs the headline distribution buckets use for "moderate" sentiment
const POSITIVE_CUTOFF = 0.2;
const NEGATIVE_CUTOFF = -0.2;

export type HeadlineLabeler = (text: string) => SentimentLabel;

/**
 * Label a headline that arrived without a sentiment tag, using the AFINN
 * comparative score (total score / token count).
 */
export function labelHeadline(text: string): SentimentLabel {
  const comparative = analyzer.analyze(normalizeHeadline(text)).comparative || 0;
  if (comparative > POSITIVE_CUTOFF) return 'positive';
  if (comparative < NEGATIVE_CUTOFF) return 'negative';
  return 'neutral';
}
