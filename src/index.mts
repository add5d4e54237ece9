#!/usr/bin/env node
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ErrorCode,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { getConfig, assertValidConfig } from './config.js';
import { logger } from './logger.js';
import { isPipelineError } from './errors.js';
import { DEFAULT_REGION } from './constants/pipeline.js';
import { loadRegistries } from './services/entities.js';
import { FileNarrativeWriter, FileReportSource, regionDir } from './services/reportStore.js';
import { runNarrativePipeline, type PipelineRun } from './services/pipeline.js';
import { overallWinner } from './services/ranking.js';
import {
  NarrativeResultSchema,
  WindowAnalysisSchema,
  narrativeResultJsonSchema,
  windowAnalysisJsonSchema,
} from './schemas/narrative.js';
import { parseDateNL } from './utils/date.js';

const config = getConfig();
assertValidConfig(config);
const registries = loadRegistries(config.entitiesPath);
const regions = Array.from(registries.keys());

const server = new Server(
  {
    name: 'party-pulse',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.onerror = (error: Error) => logger.error({ err: error }, 'Unhandled MCP error');

process.on('SIGINT', () => {
  logger.info('SIGINT received, closing server');
  server
    .close()
    .catch((err: unknown) => logger.error({ err }, 'Error while closing server'))
    .finally(() => process.exit(0));
});

const endDateProperty = {
  type: 'string',
  description: 'Last day of the window (natural language or YYYY-MM-DD, e.g., "last Sunday").',
};

const regionProperty = {
  type: 'string',
  enum: regions,
  description: `Entity set to analyze (default "${DEFAULT_REGION}").`,
};

const GenerateArgsSchema = z.object({
  endDate: z.string().trim().min(1),
  region: z.string().trim().default(DEFAULT_REGION),
  write: z.boolean().default(true),
});

const SummarizeArgsSchema = z.object({
  endDate: z.string().trim().min(1),
  region: z.string().trim().default(DEFAULT_REGION),
});

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: [
    {
      name: 'generate_narrative',
      description:
        'Rank tracked parties by average search interest over the window ending on a date and render the weekly narrative.',
      inputSchema: {
        type: 'object',
        properties: {
          endDate: endDateProperty,
          region: regionProperty,
          write: {
            type: 'boolean',
            description: 'Write <end-date>/narrative.md to the output directory (default true).',
          },
        },
        required: ['endDate'],
      },
      outputSchema: narrativeResultJsonSchema,
    },
    {
      name: 'summarize_window',
      description: 'Per-party window statistics, sentiment tallies, spikes and ranking without rendering a narrative.',
      inputSchema: {
        type: 'object',
        properties: {
          endDate: endDateProperty,
          region: regionProperty,
        },
        required: ['endDate'],
      },
      outputSchema: windowAnalysisJsonSchema,
    },
  ],
}));

async function runFor(endDateInput: string, region: string, write: boolean): Promise<PipelineRun> {
  const registry = registries.get(region);
  if (!registry) {
    throw new McpError(ErrorCode.InvalidParams, `Unknown region "${region}". Configured: ${regions.join(', ')}`);
  }
  let endDate: string;
  try {
    endDate = parseDateNL(endDateInput);
  } catch (err) {
    throw new McpError(ErrorCode.InvalidParams, err instanceof Error ? err.message : String(err));
  }
  return runNarrativePipeline(endDate, {
    source: new FileReportSource(regionDir(config.reportsDir, region)),
    sink: write ? new FileNarrativeWriter(config.outputDir, region) : undefined,
    registry,
    settings: config.pipeline,
  });
}

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
  try {
    switch (request.params.name) {
      case 'generate_narrative': {
        const args = GenerateArgsSchema.safeParse(request.params.arguments ?? {});
        if (!args.success) {
          throw new McpError(ErrorCode.InvalidParams, 'Provide an endDate (natural language or YYYY-MM-DD).');
        }

        const { endDate, region, write } = args.data;
        const run = await runFor(endDate, region, write);
        const result = NarrativeResultSchema.parse({ ...run.narrative, region, written_to: run.writtenTo });

        return {
          content: [{ type: 'text', text: run.narrative.markdown }],
          structuredContent: result,
        };
      }
      case 'summarize_window': {
        const args = SummarizeArgsSchema.safeParse(request.params.arguments ?? {});
        if (!args.success) {
          throw new McpError(ErrorCode.InvalidParams, 'Provide an endDate (natural language or YYYY-MM-DD).');
        }

        const { endDate, region } = args.data;
        const run = await runFor(endDate, region, false);
        const { analysis } = run;
        const result = WindowAnalysisSchema.parse({
          region,
          range: analysis.range,
          summaries: analysis.summaries,
          spikes: analysis.spikes,
          ranking: analysis.ranking,
          omitted: analysis.omitted,
          skipped: run.skipped.map((e) => ({ kind: e.kind, message: e.message })),
        });

        return {
          content: [{ type: 'text', text: formatWindowSummary(run, region) }],
          structuredContent: result,
        };
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${request.params.name}`);
    }
  } catch (error: unknown) {
    if (error instanceof McpError) {
      throw error;
    }
    if (isPipelineError(error, 'EmptyWindow') || isPipelineError(error, 'MalformedRecord')) {
      throw new McpError(ErrorCode.InvalidRequest, error.message);
    }
    logger.error({ err: error }, 'Unexpected tool invocation failure');
    throw new McpError(ErrorCode.InternalError, error instanceof Error ? error.message : 'Unexpected error');
  }
});

function formatWindowSummary(run: PipelineRun, region: string): string {
  const { range, ranking, spikes, omitted } = run.analysis;
  const lines = ranking.map(
    (r) =>
      `#${r.rank} ${r.name}: average ${r.average.toFixed(2)}, peak ${r.peak} on ${r.peakDate}, ` +
      `combined ${r.combinedScore.toFixed(3)}`,
  );
  const winner = overallWinner(ranking);
  return [
    `Party Pulse (${region}): ${range.start} to ${range.end}`,
    ...lines,
    `Overall winner: ${winner ? winner.name : 'none'}`,
    `Spikes: ${spikes.length}`,
    `Omitted (no scored days): ${omitted.length ? omitted.join(', ') : 'none'}`,
  ].join('\n');
}

async function start() {
  if (config.transport === 'http') {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    await server.connect(transport);

    const allowedHosts = new Set(config.allowedHosts);
    const allowedOrigins = new Set(config.allowedOrigins);

    const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
      if (req.method === 'GET' && req.url === '/healthz') {
        res.statusCode = 200;
        res.end('ok');
        return;
      }

      if (!isAllowed(req.headers.host?.split(':')[0], allowedHosts)) {
        res.statusCode = 403;
        res.end('Forbidden host');
        return;
      }
      if (!isAllowed(req.headers.origin, allowedOrigins)) {
        res.statusCode = 403;
        res.end('Forbidden origin');
        return;
      }

      transport.handleRequest(req, res).catch((err: unknown) => {
        logger.error({ err }, 'HTTP transport error');
        if (!res.headersSent) {
          res.statusCode = 500;
          res.end('Internal Server Error');
        }
      });
    });

    httpServer.listen(config.port, config.httpHost, () => {
      logger.info({ transport: 'http', host: config.httpHost, port: config.port }, 'Party Pulse server listening');
    });
  } else {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info({ transport: 'stdio' }, 'Party Pulse server listening');
  }
}

function isAllowed(value: string | undefined, whitelist: Set<string>): boolean {
  if (!whitelist.size || !value) return true;
  return whitelist.has(value);
}

start().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start Party Pulse server');
  process.exit(1);
});
