import type { DailyRecord, EntityId, Headline } from '../types.js';
import { PipelineError } from '../errors.js';
import { RawReportSchema, RawSectionSchema, type RawHeadline, type RawSection } from '../schemas/reports.js';
import { isIsoDate } from '../utils/date.js';
import { logger } from '../logger.js';
import type { EntityRegistry } from './entities.js';
import { labelHeadline, type HeadlineLabeler } from './labeling.js';

export interface IngestOptions {
  registry: EntityRegistry;
  labeler?: HeadlineLabeler;
}

export interface IngestResult {
  date: string;
  records: DailyRecord[];
  skipped: PipelineError[];
}

/**
 * Turn one raw report document into frozen DailyRecords, one per entity section.
 * Bad sections are skipped and returned in `skipped`; an unusable document
 * envelope throws MalformedRecord.
 */
export function ingestReport(document: unknown, opts: IngestOptions): IngestResult {
  const envelope = RawReportSchema.safeParse(document);
  if (!envelope.success || !isIsoDate(envelope.data.date)) {
    throw new PipelineError('MalformedRecord', 'Report document is missing a valid date or section list', {
      issues: envelope.success ? ['invalid calendar date'] : envelope.error.issues.map((i) => i.message),
    });
  }

  const { date, sections } = envelope.data;
  const labeler = opts.labeler ?? labelHeadline;
  const records: DailyRecord[] = [];
  const skipped: PipelineError[] = [];
  const seen = new Set<EntityId>();

  const skip = (error: PipelineError) => {
    logger.warn({ kind: error.kind, date, ...error.details }, error.message);
    skipped.push(error);
  };

  sections.forEach((rawSection, index) => {
    const parsed = RawSectionSchema.safeParse(rawSection);
    if (!parsed.success) {
      skip(
        new PipelineError('MalformedRecord', `Section ${index} of ${date} report is malformed`, {
          section: index,
          issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        }),
      );
      return;
    }

    const section = parsed.data;
    const entity = opts.registry.resolve(section.entity);
    if (!entity) {
      skip(
        new PipelineError('UnknownEntity', `Unknown entity "${section.entity}" in ${date} report`, {
          entity: section.entity,
        }),
      );
      return;
    }
    if (seen.has(entity.id)) {
      skip(
        new PipelineError('MalformedRecord', `Duplicate section for ${entity.id} in ${date} report`, {
          entityId: entity.id,
          section: index,
        }),
      );
      return;
    }
    seen.add(entity.id);

    records.push(toDailyRecord(entity.id, date, section, labeler));
  });

  return { date, records, skipped };
}

function toDailyRecord(
  entityId: EntityId,
  date: string,
  section: RawSection,
  labeler: HeadlineLabeler,
): DailyRecord {
  const headlines = section.headlines.map((h) => Object.freeze(toHeadline(h, labeler)));
  const notes = section.notes === undefined ? [] : Array.isArray(section.notes) ? section.notes : [section.notes];

  return Object.freeze({
    entityId,
    date,
    score: section.score ?? null,
    headlines: Object.freeze(headlines),
    notes: Object.freeze(notes.map((n) => n.trim()).filter(Boolean)),
  });
}

function toHeadline(raw: RawHeadline, labeler: HeadlineLabeler): Headline {
  if (typeof raw === 'string') {
    return { text: raw, sentiment: labeler(raw) };
  }
  const headline: Headline = {
    text: raw.text,
    sentiment: raw.sentiment ?? labeler(raw.text),
  };
  return raw.source ? { ...headline, source: raw.source } : headline;
}
