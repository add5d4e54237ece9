/**
 * Reader for the markdown layout of the daily reports:
 *
 *   # Daily report 2025-03-07
 *   ## One Nation
 *   Score: 30
 *   - [negative] Senate inquiry grills party treasurer (ABC)
 *   - Preference deal talk resurfaces
 *   > Rally in Rockhampton drew coverage
 *
 * Produces the same document shape the JSON reports use; validation happens in the ingestor.
 */

export interface MarkdownHeadline {
  text: string;
  sentiment?: string;
  source?: string;
}

export interface MarkdownSection {
  entity: string;
  score?: number | string | null; // unparseable text is kept so the ingestor rejects the section
  headlines: MarkdownHeadline[];
  notes: string[];
}

export interface MarkdownReport {
  date: string;
  sections: MarkdownSection[];
}

const DATE_IN_TEXT = /\b(\d{4}-\d{2}-\d{2})\b/;
const SECTION_HEADING = /^##\s+(.+?)\s*#*$/;
const SCORE_LINE = /^(?:\*\*)?score(?:\*\*)?\s*:\s*(?:\*\*)?\s*(.*?)\s*(?:\*\*)?$/i;
const BULLET = /^[-*]\s+(.+)$/;
const LABEL_PREFIX = /^\[([A-Za-z]+)\]\s*(.+)$/;
const SOURCE_SUFFIX = /^(.*\S)\s+\(([^()]+)\)$/;
const NOTE_LINE = /^>\s?(.*)$/;
const MISSING_SCORE = new Set(['', '-', 'n/a', 'na', 'none']);

export function parseMarkdownReport(text: string, fallbackDate: string): MarkdownReport {
  const lines = text.split(/\r?\n/);
  let date = fallbackDate;
  const sections: MarkdownSection[] = [];
  let current: MarkdownSection | undefined;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith('# ')) {
      const match = DATE_IN_TEXT.exec(line);
      if (match && !sections.length) date = match[1];
      continue;
    }

    const heading = SECTION_HEADING.exec(line);
    if (heading) {
      current = { entity: heading[1], headlines: [], notes: [] };
      sections.push(current);
      continue;
    }
    if (!current) continue;

    const score = SCORE_LINE.exec(line);
    if (score) {
      current.score = parseScore(score[1]);
      continue;
    }

    const bullet = BULLET.exec(line);
    if (bullet) {
      current.headlines.push(parseHeadline(bullet[1]));
      continue;
    }

    const note = NOTE_LINE.exec(line);
    if (note) {
      current.notes.push(note[1]);
    }
  }

  return { date, sections };
}

function parseScore(value: string): number | string | null {
  if (MISSING_SCORE.has(value.toLowerCase())) return null;
  const n = Number(value);
  return value !== '' && Number.isFinite(n) ? n : value;
}

function parseHeadline(body: string): MarkdownHeadline {
  let text = body.trim();
  let sentiment: string | undefined;
  let source: string | undefined;

  const labelled = LABEL_PREFIX.exec(text);
  if (labelled) {
    sentiment = labelled[1];
    text = labelled[2];
  }
  const sourced = SOURCE_SUFFIX.exec(text);
  if (sourced) {
    text = sourced[1];
    source = sourced[2];
  }

  return {
    text,
    ...(sentiment ? { sentiment } : {}),
    ...(source ? { source } : {}),
  };
}
