import type { DailyRecord, SentimentLabel } from '../src/types.js';
import { EntityRegistry } from '../src/services/entities.js';

export function makeRegistry(): EntityRegistry {
  return new EntityRegistry(
    [
      { id: 'Labor', name: 'Labor' },
      { id: 'Coalition', name: 'Coalition' },
      { id: 'Greens', name: 'Greens' },
      { id: 'OneNation', name: 'One Nation' },
    ],
    { ALP: 'Labor', 'Liberal Party': 'Coalition', PHON: 'OneNation' },
  );
}

export function record(
  entityId: string,
  date: string,
  score: number | null,
  labels: SentimentLabel[] = [],
): DailyRecord {
  return {
    entityId,
    date,
    score,
    headlines: labels.map((sentiment, i) => ({ text: `${entityId} headline ${date} #${i + 1}`, sentiment })),
    notes: [],
  };
}

/** One record per consecutive day starting at `start`. */
export function series(entityId: string, start: string, scores: (number | null)[]): DailyRecord[] {
  return scores.map((score, i) => {
    const d = new Date(`${start}T00:00:00Z`);
    d.setUTCDate(d.getUTCDate() + i);
    return record(entityId, d.toISOString().slice(0, 10), score);
  });
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
