import { describe, expect, it } from 'vitest';
import { combinedScore, momentumPct, overallWinner, rankEntities } from '../src/services/ranking.js';
import type { WindowSummary } from '../src/types.js';

function summary(entityId: string, average: number, peak: number): WindowSummary {
  return {
    entityId,
    range: { start: '2025-03-01', end: '2025-03-07' },
    average,
    peak,
    peakDate: '2025-03-03',
    low: 1,
    observedDays: 7,
    sentimentCounts: { positive: 0, neutral: 0, negative: 0 },
    totalHeadlines: 0,
    composite: 0,
  };
}

const nameOf = (id: string) => `name:${id}`;

describe('rankEntities', () => {
  it('orders by average, then peak, then entity id', () => {
    const ranking = rankEntities(
      [
        summary('Labor', 20, 30),
        summary('Greens', 25, 26),
        summary('Coalition', 20, 35),
        summary('Alpha', 20, 30),
      ],
      nameOf,
    );
    expect(ranking.map((r) => r.entityId)).toEqual(['Greens', 'Coalition', 'Alpha', 'Labor']);
    expect(ranking.map((r) => r.rank)).toEqual([1, 2, 3, 4]);
    expect(ranking[0].name).toBe('name:Greens');
  });

  it('yields the same order for any input order', () => {
    const inputs = [summary('B', 10, 10), summary('A', 10, 10), summary('C', 12, 1), summary('D', 10, 11)];
    const expected = ['C', 'D', 'A', 'B'];
    expect(rankEntities(inputs, nameOf).map((r) => r.entityId)).toEqual(expected);
    expect(rankEntities([...inputs].reverse(), nameOf).map((r) => r.entityId)).toEqual(expected);
  });

  it('attaches momentum against previous averages', () => {
    const ranking = rankEntities([summary('Labor', 25, 30), summary('Greens', 10, 12)], nameOf, new Map([['Labor', 20]]));
    expect(ranking[0].momentumPct).toBe(25);
    expect(ranking[1].momentumPct).toBeNull();
  });

  it('does not mutate its input', () => {
    const inputs = [summary('B', 1, 1), summary('A', 2, 2)];
    rankEntities(inputs, nameOf);
    expect(inputs.map((s) => s.entityId)).toEqual(['B', 'A']);
  });
});

describe('combinedScore', () => {
  it('blends interest against the window leader with sentiment mapped onto 0..1', () => {
    expect(combinedScore(30, 0, 30)).toBe(0.85);
    expect(combinedScore(15, 1, 30)).toBe(0.65);
    expect(combinedScore(0, -1, 0)).toBe(0);
  });

  it('is attached to every ranked entity', () => {
    const ranking = rankEntities([summary('Labor', 10, 12), { ...summary('Greens', 20, 22), composite: -0.5 }], nameOf);
    expect(ranking.map((r) => [r.entityId, r.combinedScore])).toEqual([
      ['Greens', 0.775],
      ['Labor', 0.5],
    ]);
  });
});

describe('overallWinner', () => {
  it('picks the highest combined score and leaves ties to the ranking order', () => {
    const ranking = rankEntities(
      [{ ...summary('Labor', 18, 20), composite: 0.6 }, summary('Greens', 20, 22), summary('Coalition', 20, 21)],
      nameOf,
    );
    expect(ranking.map((r) => r.entityId)).toEqual(['Greens', 'Coalition', 'Labor']);
    expect(overallWinner(ranking)?.entityId).toBe('Labor');

    const tied = rankEntities([summary('Coalition', 20, 21), summary('Greens', 20, 22)], nameOf);
    expect(overallWinner(tied)?.entityId).toBe('Greens');
    expect(overallWinner([])).toBeUndefined();
  });
});

describe('momentumPct', () => {
  it('rounds to one decimal and skips missing or zero baselines', () => {
    expect(momentumPct(15, 20)).toBe(-25);
    expect(momentumPct(23.142857, 20)).toBe(15.7);
    expect(momentumPct(10, 0)).toBeNull();
    expect(momentumPct(10, undefined)).toBeNull();
  });
});
