/**
 * Centralized configuration loader for Party Pulse.
 * Reads environment variables, parses types, and exposes a typed config object.
 *
 * Environment variables (see .env.example):
 * - TRANSPORT=stdio|http (default: stdio)
 * - PORT (default: 3000 for http transport)
 * - WINDOW_LENGTH_DAYS (default: 7)
 * - SPIKE_BASELINE_DAYS (default: 3)
 * - SPIKE_THRESHOLD_RATIO (default: 1.2)
 * - SPIKE_MIN_SCORE (default: 0)
 * - SENTIMENT_WEIGHT_POSITIVE / _NEUTRAL / _NEGATIVE (default: 1 / 0 / -1)
 * - SENTIMENT_NEUTRAL_BAND (default: 0.1)
 * - NARRATIVE_HEADLINE_LIMIT (default: 3)
 * - ENTITIES_PATH (default: config/entities.json)
 * - REPORTS_DIR (default: data/reports)
 * - OUTPUT_DIR (default: data/narratives)
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';
import { DEFAULT_PIPELINE_SETTINGS } from './constants/pipeline.js';
import type { PipelineSettings } from './types.js';

// Load environment variables from .env file
config();

export type Transport = 'stdio' | 'http';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// src/ under vitest, dist/ after build; both sit one level below the project root
export const PROJECT_ROOT = path.resolve(__dirname, '..');

export interface AppConfig {
  transport: Transport;
  port: number;
  httpHost: string;
  allowedHosts: string[];
  allowedOrigins: string[];
  logLevel: string;
  entitiesPath: string;
  reportsDir: string;
  outputDir: string;
  pipeline: PipelineSettings;
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function resolvePath(value: string | undefined, fallback: string): string {
  const raw = value?.trim() || fallback;
  return path.isAbsolute(raw) ? raw : path.join(PROJECT_ROOT, raw);
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const transport: Transport = env.TRANSPORT === 'http' ? 'http' : 'stdio';
  const defaults = DEFAULT_PIPELINE_SETTINGS;

  const pipeline: PipelineSettings = {
    windowLengthDays: parseNumber(env.WINDOW_LENGTH_DAYS) ?? defaults.windowLengthDays,
    spikeBaselineDays: parseNumber(env.SPIKE_BASELINE_DAYS) ?? defaults.spikeBaselineDays,
    spikeThresholdRatio: parseNumber(env.SPIKE_THRESHOLD_RATIO) ?? defaults.spikeThresholdRatio,
    spikeMinScore: parseNumber(env.SPIKE_MIN_SCORE) ?? defaults.spikeMinScore,
    sentimentWeights: {
      positive: parseNumber(env.SENTIMENT_WEIGHT_POSITIVE) ?? defaults.sentimentWeights.positive,
      neutral: parseNumber(env.SENTIMENT_WEIGHT_NEUTRAL) ?? defaults.sentimentWeights.neutral,
      negative: parseNumber(env.SENTIMENT_WEIGHT_NEGATIVE) ?? defaults.sentimentWeights.negative,
    },
    sentimentNeutralBand: parseNumber(env.SENTIMENT_NEUTRAL_BAND) ?? defaults.sentimentNeutralBand,
    headlineLimit: parseNumber(env.NARRATIVE_HEADLINE_LIMIT) ?? defaults.headlineLimit,
  };

  return {
    transport,
    port: Number(env.PORT || 3000),
    httpHost: env.HOST?.trim() || '0.0.0.0',
    allowedHosts: parseList(env.ALLOWED_HOSTS),
    allowedOrigins: parseList(env.ALLOWED_ORIGINS),
    logLevel: env.LOG_LEVEL?.trim() || 'info',
    entitiesPath: resolvePath(env.ENTITIES_PATH, path.join('config', 'entities.json')),
    reportsDir: resolvePath(env.REPORTS_DIR, path.join('data', 'reports')),
    outputDir: resolvePath(env.OUTPUT_DIR, path.join('data', 'narratives')),
    pipeline,
  };
}

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

/**
 * Reject settings the pipeline cannot honor. Called once at startup.
 */
export function assertValidConfig(cfg: AppConfig) {
  const p = cfg.pipeline;
  if (!isPositiveInteger(p.windowLengthDays)) {
    throw new Error(`WINDOW_LENGTH_DAYS must be a positive integer (got ${p.windowLengthDays})`);
  }
  if (!isPositiveInteger(p.spikeBaselineDays)) {
    throw new Error(`SPIKE_BASELINE_DAYS must be a positive integer (got ${p.spikeBaselineDays})`);
  }
  if (!(p.spikeThresholdRatio > 0)) {
    throw new Error(`SPIKE_THRESHOLD_RATIO must be greater than 0 (got ${p.spikeThresholdRatio})`);
  }
  if (!Number.isInteger(p.headlineLimit) || p.headlineLimit < 0) {
    throw new Error(`NARRATIVE_HEADLINE_LIMIT must be a non-negative integer (got ${p.headlineLimit})`);
  }
  if (p.sentimentNeutralBand < 0 || p.sentimentNeutralBand >= 1) {
    throw new Error(`SENTIMENT_NEUTRAL_BAND must be in [0, 1) (got ${p.sentimentNeutralBand})`);
  }
  for (const [label, weight] of Object.entries(p.sentimentWeights)) {
    if (weight < -1 || weight > 1) {
      throw new Error(`Sentiment weight for ${label} must be within [-1, 1] (got ${weight})`);
    }
  }
}
