import type { DailyRecord, DateRange, EntityId, ScoreSummary } from '../types.js';
import { PipelineError } from '../errors.js';
import { isWithin } from '../utils/date.js';

/**
 * Records for one entity inside a range, oldest first.
 * Sorting here keeps every downstream sum in a fixed order regardless of input order.
 */
export function recordsInRange(
  entityId: EntityId,
  range: DateRange,
  records: readonly DailyRecord[],
): DailyRecord[] {
  return records
    .filter((r) => r.entityId === entityId && isWithin(r.date, range))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * Average, peak (earliest date on ties) and low over the scored days of a window.
 * Days with a null score are left out of every statistic.
 */
export function aggregateScores(
  entityId: EntityId,
  range: DateRange,
  records: readonly DailyRecord[],
): ScoreSummary {
  const scored: { date: string; score: number }[] = [];
  for (const r of recordsInRange(entityId, range, records)) {
    if (r.score !== null) scored.push({ date: r.date, score: r.score });
  }

  if (!scored.length) {
    throw new PipelineError('InsufficientData', `No scored records for ${entityId} between ${range.start} and ${range.end}`, {
      entityId,
      range,
    });
  }

  let sum = 0;
  let peak = scored[0];
  let low = scored[0].score;
  for (const day of scored) {
    sum += day.score;
    if (day.score > peak.score) peak = day;
    if (day.score < low) low = day.score;
  }

  return {
    entityId,
    range: { ...range },
    average: sum / scored.length,
    peak: peak.score,
    peakDate: peak.date,
    low,
    observedDays: scored.length,
  };
}
