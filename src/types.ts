/**
 * Shared types for Party Pulse.
 * Records are produced once by the ingestor and never mutated afterwards.
 */

export type EntityId = string; // canonical id from config/entities.json, e.g. "OneNation"

export type SentimentLabel = 'positive' | 'neutral' | 'negative';

export type SentimentCounts = Record<SentimentLabel, number>;

export type SentimentWeights = Record<SentimentLabel, number>;

export interface Entity {
  id: EntityId;
  name: string;
  color?: string;
}

export interface DateRange {
  start: string; // YYYY-MM-DD inclusive
  end: string; // YYYY-MM-DD inclusive
}

export interface Headline {
  readonly text: string;
  readonly sentiment: SentimentLabel;
  readonly source?: string;
}

export interface DailyRecord {
  readonly entityId: EntityId;
  readonly date: string; // YYYY-MM-DD
  readonly score: number | null; // null when the report carried no score line
  readonly headlines: readonly Headline[];
  readonly notes: readonly string[];
}

export interface ScoreSummary {
  entityId: EntityId;
  range: DateRange;
  average: number;
  peak: number;
  peakDate: string;
  low: number;
  observedDays: number;
}

export interface SentimentSummary {
  entityId: EntityId;
  range: DateRange;
  counts: SentimentCounts;
  total: number;
  composite: number; // -1..1
}

export interface WindowSummary extends ScoreSummary {
  sentimentCounts: SentimentCounts;
  totalHeadlines: number;
  composite: number;
}

export interface SpikeFlag {
  entityId: EntityId;
  date: string;
  baseline: number;
  observed: number;
  ratio: number;
}

export interface RankedEntity {
  rank: number;
  entityId: EntityId;
  name: string;
  average: number;
  peak: number;
  peakDate: string;
  low: number;
  composite: number;
  momentumPct: number | null; // vs. the previous window of the same length
  combinedScore: number; // weighted blend of normalised interest and sentiment, 0..1
}

export type SentimentSign = 'positive' | 'neutral' | 'negative';

export interface Outlook {
  sign: SentimentSign;
  spiking: boolean;
}

export interface Narrative {
  range: DateRange;
  ranking: RankedEntity[];
  dominant: EntityId;
  overallWinner: EntityId; // highest combined score
  outlook: Outlook;
  markdown: string;
}

export interface PipelineSettings {
  windowLengthDays: number;
  spikeBaselineDays: number;
  spikeThresholdRatio: number;
  spikeMinScore: number;
  sentimentWeights: SentimentWeights;
  sentimentNeutralBand: number;
  headlineLimit: number;
}
