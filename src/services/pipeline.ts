import type { DailyRecord, DateRange, EntityId, Narrative, PipelineSettings, RankedEntity, SpikeFlag, WindowSummary } from '../types.js';
import { PipelineError, isPipelineError } from '../errors.js';
import { addDays, datesBetween, windowEnding } from '../utils/date.js';
import { logger } from '../logger.js';
import type { EntityRegistry } from './entities.js';
import { ingestReport } from './ingestor.js';
import type { HeadlineLabeler } from './labeling.js';
import { aggregateScores } from './aggregator.js';
import { buildWindowSummary } from './sentimentSummary.js';
import { detectSpikes } from './spikes.js';
import { rankEntities } from './ranking.js';
import { generateNarrative } from './narrative.js';
import type { NarrativeSink, ReportSource } from './reportStore.js';

export interface WindowAnalysis {
  range: DateRange;
  summaries: WindowSummary[];
  spikes: SpikeFlag[];
  ranking: RankedEntity[];
  previousAverages: Map<EntityId, number>;
  omitted: EntityId[]; // entities without a single scored day in the window
}

export interface PipelineRun {
  analysis: WindowAnalysis;
  narrative: Narrative;
  skipped: PipelineError[];
  writtenTo: string | null;
}

export interface PipelineDeps {
  source: ReportSource;
  sink?: NarrativeSink;
  registry: EntityRegistry;
  settings: PipelineSettings;
  labeler?: HeadlineLabeler;
  signal?: AbortSignal;
}

/**
 * Earliest date any stage reads: the previous window (for momentum) or the
 * spike lookback before the window start, whichever reaches further back.
 */
export function loadRange(endDate: string, settings: PipelineSettings): DateRange {
  const window = windowEnding(endDate, settings.windowLengthDays);
  const previousStart = addDays(window.start, -settings.windowLengthDays);
  const lookbackStart = addDays(window.start, -settings.spikeBaselineDays);
  return { start: previousStart < lookbackStart ? previousStart : lookbackStart, end: endDate };
}

/**
 * Summaries, spikes and ranking for every registry entity over the window ending on `endDate`.
 * Pure: works only on the records passed in.
 */
export function analyzeWindow(
  records: readonly DailyRecord[],
  endDate: string,
  registry: EntityRegistry,
  settings: PipelineSettings,
): WindowAnalysis {
  const range = windowEnding(endDate, settings.windowLengthDays);
  const previousRange = windowEnding(addDays(range.start, -1), settings.windowLengthDays);

  const summaries: WindowSummary[] = [];
  const spikes: SpikeFlag[] = [];
  const previousAverages = new Map<EntityId, number>();
  const omitted: EntityId[] = [];

  for (const entity of registry.list()) {
    let summary: WindowSummary;
    try {
      summary = buildWindowSummary(entity.id, range, records, settings.sentimentWeights);
    } catch (err) {
      if (!isPipelineError(err, 'InsufficientData')) throw err;
      logger.warn({ kind: err.kind, entityId: entity.id, range }, 'Omitting entity from ranking');
      omitted.push(entity.id);
      continue;
    }
    summaries.push(summary);
    spikes.push(
      ...detectSpikes(summary, records, {
        baselineDays: settings.spikeBaselineDays,
        thresholdRatio: settings.spikeThresholdRatio,
        minScore: settings.spikeMinScore,
      }),
    );

    try {
      previousAverages.set(entity.id, aggregateScores(entity.id, previousRange, records).average);
    } catch (err) {
      if (!isPipelineError(err, 'InsufficientData')) throw err;
      logger.debug({ entityId: entity.id, range: previousRange }, 'No previous window data for momentum');
    }
  }

  if (!summaries.length) {
    throw new PipelineError('EmptyWindow', `No entity has scored data between ${range.start} and ${range.end}`, {
      range,
      omitted,
    });
  }

  return {
    range,
    summaries,
    spikes,
    ranking: rankEntities(summaries, (id) => registry.nameOf(id), previousAverages),
    previousAverages,
    omitted,
  };
}

/**
 * Read every report the window needs, ingest, analyze, render and hand the
 * narrative to the sink. A report whose own date differs from the date it was
 * loaded for is skipped whole. An abort from `signal` stops the run before anything is written.
 */
export async function runNarrativePipeline(endDate: string, deps: PipelineDeps): Promise<PipelineRun> {
  const { source, sink, registry, settings, signal } = deps;
  const span = loadRange(endDate, settings);

  const records: DailyRecord[] = [];
  const skipped: PipelineError[] = [];

  for (const date of datesBetween(span.start, span.end)) {
    signal?.throwIfAborted();
    try {
      const document = await source.load(date);
      if (document === undefined) continue;
      const result = ingestReport(document, { registry, labeler: deps.labeler });
      if (result.date !== date) {
        throw new PipelineError('MalformedRecord', `Report loaded for ${date} is dated ${result.date}`, {
          expected: date,
          found: result.date,
        });
      }
      records.push(...result.records);
      skipped.push(...result.skipped);
    } catch (err) {
      if (!isPipelineError(err, 'MalformedRecord')) throw err;
      logger.warn({ kind: err.kind, date, ...err.details }, err.message);
      skipped.push(err);
    }
  }

  signal?.throwIfAborted();
  const analysis = analyzeWindow(records, endDate, registry, settings);
  const narrative = generateNarrative({
    range: analysis.range,
    summaries: analysis.summaries,
    spikes: analysis.spikes,
    records,
    nameOf: (id) => registry.nameOf(id),
    previousAverages: analysis.previousAverages,
    settings,
  });

  signal?.throwIfAborted();
  const writtenTo = sink ? await sink.write(narrative) : null;

  logger.info(
    {
      range: analysis.range,
      dominant: narrative.dominant,
      overallWinner: narrative.overallWinner,
      records: records.length,
      spikes: analysis.spikes.length,
      omitted: analysis.omitted.length,
      skipped: skipped.length,
      writtenTo,
    },
    'Narrative pipeline complete',
  );

  return { analysis, narrative, skipped, writtenTo };
}
