import { z } from 'zod';
import { SENTIMENT_LABELS } from '../constants/pipeline.js';

export const SentimentLabelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(SENTIMENT_LABELS));

export const RawHeadlineSchema = z.union([
  z.string().trim().min(1),
  z.object({
    text: z.string().trim().min(1),
    sentiment: SentimentLabelSchema.optional(),
    source: z.string().trim().min(1).optional(),
  }),
]);

export const RawSectionSchema = z.object({
  entity: z.string().trim().min(1),
  score: z.number().finite().nonnegative().nullable().optional(),
  headlines: z.array(RawHeadlineSchema).default([]),
  notes: z.union([z.string(), z.array(z.string())]).optional(),
});

/**
 * Sections are validated one at a time so a bad section only drops itself.
 */
export const RawReportSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD'),
  sections: z.array(z.unknown()),
});

const EntitySetSchema = z.object({
  entities: z
    .array(
      z.object({
        id: z.string().trim().min(1),
        name: z.string().trim().min(1),
        color: z.string().optional(),
      }),
    )
    .min(1),
  aliases: z.record(z.string()).default({}),
});

// region names double as directory names under the reports and output roots
const RegionNameSchema = z.string().regex(/^[a-z][a-z0-9-]*$/, 'region names are lowercase slugs');

/**
 * The top-level entity set is the default region; `regions` adds further
 * entity sets, each analyzed on its own.
 */
export const EntitiesFileSchema = EntitySetSchema.extend({
  regions: z.record(RegionNameSchema, EntitySetSchema).default({}),
});

export type RawHeadline = z.infer<typeof RawHeadlineSchema>;
export type RawSection = z.infer<typeof RawSectionSchema>;
