import { describe, expect, it } from 'vitest';
import { buildWindowSummary, compositeScore, summarizeSentiment } from '../src/services/sentimentSummary.js';
import type { SentimentLabel } from '../src/types.js';
import { catchError, record } from './helpers.js';

const WEEK = { start: '2025-03-01', end: '2025-03-07' };

function labels(label: SentimentLabel, count: number): SentimentLabel[] {
  return new Array<SentimentLabel>(count).fill(label);
}

describe('summarizeSentiment', () => {
  it('tallies 42 neutral and 1 negative into a composite of -1/43', () => {
    const records = [
      record('OneNation', '2025-03-02', 20, labels('neutral', 30)),
      record('OneNation', '2025-03-05', 25, [...labels('neutral', 12), 'negative']),
    ];
    const summary = summarizeSentiment('OneNation', WEEK, records);

    expect(summary.counts).toEqual({ positive: 0, neutral: 42, negative: 1 });
    expect(summary.total).toBe(43);
    expect(summary.composite).toBeCloseTo(-0.0233, 4);
  });

  it('returns exactly 0 with zero-filled counts when there are no headlines', () => {
    const summary = summarizeSentiment('Labor', WEEK, [record('Labor', '2025-03-01', 10)]);
    expect(summary.counts).toEqual({ positive: 0, neutral: 0, negative: 0 });
    expect(summary.total).toBe(0);
    expect(Object.is(summary.composite, 0)).toBe(true);
  });

  it('counts sum to the number of headline labels in the window only', () => {
    const records = [
      record('Greens', '2025-03-01', 5, ['positive', 'negative']),
      record('Greens', '2025-03-04', 6, ['neutral', 'neutral', 'positive']),
      record('Greens', '2025-03-09', 6, ['negative']),
      record('Labor', '2025-03-04', 6, ['negative']),
    ];
    const summary = summarizeSentiment('Greens', WEEK, records);
    const sum = summary.counts.positive + summary.counts.neutral + summary.counts.negative;
    expect(sum).toBe(5);
    expect(summary.total).toBe(5);
    expect(summary.composite).toBeCloseTo(0.2, 10);
  });

  it('supports configurable weights', () => {
    const records = [record('OneNation', '2025-03-02', 20, [...labels('neutral', 42), 'negative'])];
    const summary = summarizeSentiment('OneNation', WEEK, records, { positive: 1, neutral: -0.05, negative: -1 });
    expect(summary.composite).toBeCloseTo(-0.0721, 4);
  });
});

describe('compositeScore', () => {
  it('stays within [-1, 1] at the extremes', () => {
    expect(compositeScore({ positive: 7, neutral: 0, negative: 0 })).toBe(1);
    expect(compositeScore({ positive: 0, neutral: 0, negative: 3 })).toBe(-1);
    expect(compositeScore({ positive: 2, neutral: 0, negative: 2 })).toBe(0);
  });
});

describe('buildWindowSummary', () => {
  it('combines score statistics with sentiment tallies', () => {
    const records = [
      record('Labor', '2025-03-01', 10, ['positive']),
      record('Labor', '2025-03-02', 30, ['negative', 'positive', 'positive']),
    ];
    const summary = buildWindowSummary('Labor', WEEK, records);
    expect(summary).toEqual({
      entityId: 'Labor',
      range: WEEK,
      average: 20,
      peak: 30,
      peakDate: '2025-03-02',
      low: 10,
      observedDays: 2,
      sentimentCounts: { positive: 3, neutral: 0, negative: 1 },
      totalHeadlines: 4,
      composite: 0.5,
    });
  });

  it('raises InsufficientData even when headlines exist but no score does', () => {
    const records = [record('Labor', '2025-03-01', null, ['positive'])];
    expect(catchError(() => buildWindowSummary('Labor', WEEK, records))).toMatchObject({ kind: 'InsufficientData' });
  });
});
