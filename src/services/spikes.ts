import type { DailyRecord, SpikeFlag, WindowSummary } from '../types.js';
import { DEFAULT_PIPELINE_SETTINGS } from '../constants/pipeline.js';
import { addDays, isWithin } from '../utils/date.js';
import { recordsInRange } from './aggregator.js';

export interface SpikeOptions {
  baselineDays: number; // calendar days before each date that feed its baseline
  thresholdRatio: number; // observed / baseline needed to flag
  minScore: number; // observed scores below this are never flagged
}

export const DEFAULT_SPIKE_OPTIONS: SpikeOptions = {
  baselineDays: DEFAULT_PIPELINE_SETTINGS.spikeBaselineDays,
  thresholdRatio: DEFAULT_PIPELINE_SETTINGS.spikeThresholdRatio,
  minScore: DEFAULT_PIPELINE_SETTINGS.spikeMinScore,
};

/**
 * Flag window days whose score is at least `thresholdRatio` times the mean of
 * the scored days in the preceding `baselineDays` calendar days. Baseline days
 * may fall before the window start. A day with no scored prior day, or a zero
 * baseline, is never flagged.
 */
export function detectSpikes(
  summary: WindowSummary,
  records: readonly DailyRecord[],
  opts: SpikeOptions = DEFAULT_SPIKE_OPTIONS,
): SpikeFlag[] {
  const lookback = { start: addDays(summary.range.start, -opts.baselineDays), end: summary.range.end };
  const scored = recordsInRange(summary.entityId, lookback, records).flatMap((r) =>
    r.score === null ? [] : [{ date: r.date, score: r.score }],
  );

  const flags: SpikeFlag[] = [];
  for (const day of scored) {
    if (!isWithin(day.date, summary.range)) continue;

    const since = addDays(day.date, -opts.baselineDays);
    const prior = scored.filter((p) => p.date >= since && p.date < day.date);
    if (!prior.length) continue;

    const baseline = prior.reduce((acc, p) => acc + p.score, 0) / prior.length;
    if (baseline <= 0 || day.score < opts.minScore) continue;

    const ratio = day.score / baseline;
    if (ratio >= opts.thresholdRatio) {
      flags.push({
        entityId: summary.entityId,
        date: day.date,
        baseline,
        observed: day.score,
        ratio,
      });
    }
  }

  return flags;
}
