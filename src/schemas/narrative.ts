import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const DateRangeSchema = z.object({
  start: z.string(),
  end: z.string(),
});

const SentimentCountsSchema = z.object({
  positive: z.number(),
  neutral: z.number(),
  negative: z.number(),
});

const RankedEntitySchema = z.object({
  rank: z.number(),
  entityId: z.string(),
  name: z.string(),
  average: z.number(),
  peak: z.number(),
  peakDate: z.string(),
  low: z.number(),
  composite: z.number(),
  momentumPct: z.number().nullable(),
  combinedScore: z.number().min(0).max(1),
});

const WindowSummarySchema = z.object({
  entityId: z.string(),
  range: DateRangeSchema,
  average: z.number(),
  peak: z.number(),
  peakDate: z.string(),
  low: z.number(),
  observedDays: z.number(),
  sentimentCounts: SentimentCountsSchema,
  totalHeadlines: z.number(),
  composite: z.number().min(-1).max(1),
});

const SpikeFlagSchema = z.object({
  entityId: z.string(),
  date: z.string(),
  baseline: z.number(),
  observed: z.number(),
  ratio: z.number(),
});

export const NarrativeResultSchema = z.object({
  region: z.string(),
  range: DateRangeSchema,
  ranking: z.array(RankedEntitySchema),
  dominant: z.string(),
  overallWinner: z.string(),
  outlook: z.object({
    sign: z.enum(['positive', 'neutral', 'negative']),
    spiking: z.boolean(),
  }),
  markdown: z.string(),
  written_to: z.string().nullable(),
});

export const WindowAnalysisSchema = z.object({
  region: z.string(),
  range: DateRangeSchema,
  summaries: z.array(WindowSummarySchema),
  spikes: z.array(SpikeFlagSchema),
  ranking: z.array(RankedEntitySchema),
  omitted: z.array(z.string()),
  skipped: z.array(
    z.object({
      kind: z.string(),
      message: z.string(),
    }),
  ),
});

/**
 * Flat JSON Schema for an MCP tool's outputSchema, which must be a bare object schema.
 */
function toToolSchema(schema: z.ZodTypeAny) {
  return { ...zodToJsonSchema(schema, { $refStrategy: 'none' }), type: 'object' as const };
}

export const narrativeResultJsonSchema = toToolSchema(NarrativeResultSchema);

export const windowAnalysisJsonSchema = toToolSchema(WindowAnalysisSchema);
