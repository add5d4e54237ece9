import type {
  DailyRecord,
  DateRange,
  EntityId,
  Headline,
  Narrative,
  Outlook,
  PipelineSettings,
  RankedEntity,
  SentimentSign,
  SpikeFlag,
  WindowSummary,
} from '../types.js';
import { PipelineError } from '../errors.js';
import { recordsInRange } from './aggregator.js';
import { overallWinner, rankEntities } from './ranking.js';

export type NarrativeSettings = Pick<PipelineSettings, 'spikeBaselineDays' | 'sentimentNeutralBand' | 'headlineLimit'>;

export interface NarrativeInput {
  range: DateRange;
  summaries: readonly WindowSummary[];
  spikes: readonly SpikeFlag[];
  records: readonly DailyRecord[];
  nameOf: (id: EntityId) => string;
  previousAverages?: ReadonlyMap<EntityId, number>;
  settings: NarrativeSettings;
}

type OutlookTemplates = {
  readonly [S in SentimentSign]: { readonly spiking: string; readonly steady: string };
};

/**
 * Closing clause per (sentiment sign, spike presence). Only `{name}` is substituted.
 */
export const OUTLOOK_TEMPLATES: OutlookTemplates = {
  positive: {
    spiking: '{name} carries a burst of attention on favourable coverage into next week; the next window will show whether the surge holds.',
    steady: '{name} holds steady attention on favourable coverage; expect the lead to persist absent a new catalyst.',
  },
  neutral: {
    spiking: 'Attention on {name} spiked without a clear sentiment lean; watch whether interest settles or keeps building.',
    steady: '{name} leads on steady, largely neutral coverage; the ranking looks stable going into the next window.',
  },
  negative: {
    spiking: '{name} drew a spike of attention on unfavourable coverage; watch whether the negative run persists.',
    steady: '{name} leads on attention while coverage leans unfavourable; sentiment is the figure to watch next window.',
  },
};

export function sentimentSign(composite: number, neutralBand: number): SentimentSign {
  if (composite > neutralBand) return 'positive';
  if (composite < -neutralBand) return 'negative';
  return 'neutral';
}

export function selectOutlook(composite: number, hasSpike: boolean, neutralBand: number): Outlook {
  return { sign: sentimentSign(composite, neutralBand), spiking: hasSpike };
}

export function outlookClause(outlook: Outlook, name: string): string {
  const template = OUTLOOK_TEMPLATES[outlook.sign][outlook.spiking ? 'spiking' : 'steady'];
  return fill(template, { name });
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => values[key] ?? whole);
}

export function formatScore(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(2);
}

export function formatSigned(n: number): string {
  return `${n >= 0 ? '+' : ''}${n.toFixed(2)}`;
}

function formatMomentum(pct: number | null): string {
  if (pct === null) return '';
  return `, ${pct > 0 ? '+' : ''}${pct}% vs previous window`;
}

/**
 * Headlines for the narrative: the peak day's first, then the remaining days newest first.
 */
export function representativeHeadlines(
  summary: WindowSummary,
  records: readonly DailyRecord[],
  limit: number,
): { date: string; headline: Headline }[] {
  const inWindow = recordsInRange(summary.entityId, summary.range, records);
  const peakDay = inWindow.filter((r) => r.date === summary.peakDate);
  const others = inWindow.filter((r) => r.date !== summary.peakDate).reverse();

  return [...peakDay, ...others]
    .flatMap((r) => r.headlines.map((headline) => ({ date: r.date, headline })))
    .slice(0, limit);
}

/**
 * Render the window narrative. Every figure in the text comes from the inputs;
 * wording is fixed template text.
 */
export function generateNarrative(input: NarrativeInput): Narrative {
  const { range, summaries, spikes, records, nameOf, settings } = input;
  if (!summaries.length) {
    throw new PipelineError('EmptyWindow', `No entity has data between ${range.start} and ${range.end}`, { range });
  }

  const ranking = rankEntities(summaries, nameOf, input.previousAverages);
  const top = ranking[0];
  const winner = overallWinner(ranking) ?? top;
  const dominant = summaries.find((s) => s.entityId === top.entityId);
  if (!dominant) {
    throw new Error(`Ranking produced an entity without a summary: ${top.entityId}`);
  }

  const windowSpikes = spikes
    .filter((s) => s.date >= range.start && s.date <= range.end)
    .sort(compareFlags);
  const outlook = selectOutlook(
    dominant.composite,
    windowSpikes.some((s) => s.entityId === dominant.entityId),
    settings.sentimentNeutralBand,
  );

  const lines: string[] = [
    `## Week in Review: ${range.start} to ${range.end}`,
    '',
    `**${top.name}** ranked #1 by average search interest at ${formatScore(top.average)}, ` +
      `peaking at ${formatScore(top.peak)} on ${top.peakDate}.`,
    `Overall winner on interest and sentiment combined: **${winner.name}** (${winner.combinedScore.toFixed(3)}).`,
    '',
    '### Rankings',
    '',
    ...ranking.map((r) => rankingLine(r, settings.sentimentNeutralBand)),
    '',
    '### Spikes',
    '',
  ];

  if (windowSpikes.length) {
    for (const s of windowSpikes) {
      lines.push(
        `- ${s.date}: ${nameOf(s.entityId)} scored ${formatScore(s.observed)}, ` +
          `${s.ratio.toFixed(2)}x its ${settings.spikeBaselineDays}-day baseline of ${formatScore(s.baseline)}`,
      );
    }
  } else {
    lines.push('No spikes detected this window.');
  }

  const counts = dominant.sentimentCounts;
  lines.push(
    '',
    '### Sentiment',
    '',
    dominant.totalHeadlines
      ? `${top.name} headlines: ${counts.positive} positive, ${counts.neutral} neutral, ` +
          `${counts.negative} negative (composite ${formatSigned(dominant.composite)}).`
      : `No labelled headlines for ${top.name} this window (composite ${formatSigned(dominant.composite)}).`,
  );

  if (settings.headlineLimit > 0) {
    const picks = representativeHeadlines(dominant, records, settings.headlineLimit);
    lines.push('', '### Headlines', '');
    if (picks.length) {
      for (const { date, headline } of picks) {
        const source = headline.source ? ` (${headline.source})` : '';
        lines.push(`- ${date}: ${headline.text}${source}, ${headline.sentiment}`);
      }
    } else {
      lines.push(`No headlines recorded for ${top.name} this window.`);
    }
  }

  lines.push('', '### Outlook', '', outlookClause(outlook, top.name), '');

  return {
    range: { ...range },
    ranking,
    dominant: top.entityId,
    overallWinner: winner.entityId,
    outlook,
    markdown: lines.join('\n'),
  };
}

function compareFlags(a: SpikeFlag, b: SpikeFlag): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0;
}

function rankingLine(r: RankedEntity, neutralBand: number): string {
  return (
    `${r.rank}. **${r.name}**: average ${formatScore(r.average)}, peak ${formatScore(r.peak)} on ${r.peakDate}, ` +
    `low ${formatScore(r.low)}, sentiment ${sentimentSign(r.composite, neutralBand)} (${formatSigned(r.composite)}), ` +
    `combined ${r.combinedScore.toFixed(3)}` +
    formatMomentum(r.momentumPct)
  );
}
