import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Narrative } from '../types.js';
import { DEFAULT_REGION } from '../constants/pipeline.js';
import { PipelineError } from '../errors.js';
import { parseMarkdownReport } from './markdownReport.js';

/**
 * Pipeline boundary: where raw reports come from and where narratives go.
 * The core never touches the filesystem itself.
 */
export interface ReportSource {
  /** The raw report document for a date, or undefined when none exists. */
  load(date: string): Promise<unknown>;
}

export interface NarrativeSink {
  /** Persist the narrative; resolves to a locator for logs (a path for the file writer). */
  write(narrative: Narrative): Promise<string>;
}

/**
 * Reports for the default region sit directly under the root; other regions get a subdirectory.
 */
export function regionDir(root: string, region: string): string {
  return region === DEFAULT_REGION ? root : path.join(root, region);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
}

/**
 * Reads `<dir>/<date>.json`, falling back to `<dir>/<date>.md`.
 * Unparseable JSON throws MalformedRecord.
 */
export class FileReportSource implements ReportSource {
  constructor(private readonly dir: string) {}

  async load(date: string): Promise<unknown> {
    const json = await readIfExists(path.join(this.dir, `${date}.json`));
    if (json !== undefined) {
      try {
        const parsed: unknown = JSON.parse(json);
        return parsed;
      } catch (err) {
        throw new PipelineError('MalformedRecord', `Report for ${date} is not valid JSON`, {
          date,
          reason: err instanceof Error ? err.message : String(err),
        });
      }
    }

    const markdown = await readIfExists(path.join(this.dir, `${date}.md`));
    return markdown === undefined ? undefined : parseMarkdownReport(markdown, date);
  }
}

/**
 * Writes `<dir>/<window-end-date>/narrative.md` and a `narrative.json` companion,
 * one level further down in `<region>/` for regions other than the default.
 */
export class FileNarrativeWriter implements NarrativeSink {
  constructor(
    private readonly dir: string,
    private readonly region: string = DEFAULT_REGION,
  ) {}

  async write(narrative: Narrative): Promise<string> {
    const outDir = regionDir(path.join(this.dir, narrative.range.end), this.region);
    await fs.mkdir(outDir, { recursive: true });

    const markdownPath = path.join(outDir, 'narrative.md');
    await fs.writeFile(markdownPath, narrative.markdown, 'utf-8');
    await fs.writeFile(
      path.join(outDir, 'narrative.json'),
      JSON.stringify(
        {
          date: narrative.range.end,
          region: this.region,
          range: narrative.range,
          dominant: narrative.dominant,
          overallWinner: narrative.overallWinner,
          outlook: narrative.outlook,
          ranking: narrative.ranking,
          narrative: narrative.markdown,
        },
        null,
        2,
      ),
      'utf-8',
    );
    return markdownPath;
  }
}
