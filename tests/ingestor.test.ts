import { describe, expect, it } from 'vitest';
import { ingestReport } from '../src/services/ingestor.js';
import { PipelineError } from '../src/errors.js';
import { catchError, makeRegistry } from './helpers.js';

const opts = { registry: makeRegistry(), labeler: () => 'neutral' as const };

describe('ingestReport', () => {
  it('builds one record per section and resolves aliases', () => {
    const result = ingestReport(
      {
        date: '2025-03-07',
        sections: [
          {
            entity: 'PHON',
            score: 30,
            headlines: [
              { text: 'Hanson calls for inquiry', sentiment: 'Negative', source: 'ABC' },
              'Preference deal talk resurfaces',
            ],
            notes: 'Rally in Rockhampton',
          },
          { entity: 'alp', headlines: [] },
        ],
      },
      opts,
    );

    expect(result.date).toBe('2025-03-07');
    expect(result.skipped).toEqual([]);
    expect(result.records).toEqual([
      {
        entityId: 'OneNation',
        date: '2025-03-07',
        score: 30,
        headlines: [
          { text: 'Hanson calls for inquiry', sentiment: 'negative', source: 'ABC' },
          { text: 'Preference deal talk resurfaces', sentiment: 'neutral' },
        ],
        notes: ['Rally in Rockhampton'],
      },
      { entityId: 'Labor', date: '2025-03-07', score: null, headlines: [], notes: [] },
    ]);
  });

  it('freezes records and their headlines', () => {
    const { records } = ingestReport(
      { date: '2025-03-07', sections: [{ entity: 'Greens', score: 4, headlines: ['Greens back tax plan'] }] },
      opts,
    );
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(Object.isFrozen(records[0].headlines)).toBe(true);
    expect(Object.isFrozen(records[0].headlines[0])).toBe(true);
  });

  it('skips unknown entities and keeps going', () => {
    const result = ingestReport(
      {
        date: '2025-03-07',
        sections: [
          { entity: 'Teal Independents', score: 12 },
          { entity: 'Coalition', score: 15 },
        ],
      },
      opts,
    );
    expect(result.records.map((r) => r.entityId)).toEqual(['Coalition']);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0]).toMatchObject({ kind: 'UnknownEntity', details: { entity: 'Teal Independents' } });
  });

  it('skips malformed sections, unknown labels and duplicate entities', () => {
    const result = ingestReport(
      {
        date: '2025-03-07',
        sections: [
          { entity: 'Labor', score: -5 },
          { entity: 'Greens', score: 3, headlines: [{ text: 'Greens rally', sentiment: 'furious' }] },
          'not a section',
          { entity: 'Coalition', score: 8 },
          { entity: 'Liberal Party', score: 9 },
        ],
      },
      opts,
    );
    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({ entityId: 'Coalition', score: 8 });
    expect(result.skipped.map((e) => e.kind)).toEqual([
      'MalformedRecord',
      'MalformedRecord',
      'MalformedRecord',
      'MalformedRecord',
    ]);
  });

  it('throws MalformedRecord for an unusable document', () => {
    for (const doc of [null, { sections: [] }, { date: 'yesterday', sections: [] }, { date: '2025-02-30', sections: [] }]) {
      const err = catchError(() => ingestReport(doc, opts));
      expect(err).toBeInstanceOf(PipelineError);
      expect(err).toMatchObject({ kind: 'MalformedRecord' });
    }
  });

  it('does not mutate its input', () => {
    const doc = {
      date: '2025-03-07',
      sections: [{ entity: ' ALP ', score: 10, headlines: [{ text: ' Budget reply ', sentiment: 'POSITIVE' }] }],
    };
    const before = structuredClone(doc);
    const { records } = ingestReport(doc, opts);
    expect(doc).toEqual(before);
    expect(records[0].headlines[0]).toEqual({ text: 'Budget reply', sentiment: 'positive' });
  });
});
