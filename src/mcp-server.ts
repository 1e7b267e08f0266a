#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) server entry point.
 *
 * Tools:
 *   - gather_fundamentals: fundamental report for one ticker
 *   - gather_research: run an agent's gather pipeline
 *   - list_sources: registered sources and agent defaults
 *
 * Resources:
 *   - equity-gather://metrics: the normalized metric taxonomy
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { loadConfig } from './core/config.js';
import { errorMessage } from './core/errors.js';
import { normalizeTicker } from './core/resolver.js';
import { createRuntime } from './runtime.js';
import { gatherFundamentals } from './sources/fundamentals.js';
import { METRIC_DEFINITIONS } from './processing/metric-definitions.js';
import { renderGatherJson } from './output/gather-renderer.js';

const runtime = createRuntime(loadConfig());

const server = new McpServer(
  { name: 'equity-gather', version: '0.1.0' },
  { capabilities: { tools: {}, resources: {} } }
);

function errorResult(err: unknown) {
  return { content: [{ type: 'text' as const, text: errorMessage(err) }], isError: true };
}

// ── Tools ──────────────────────────────────────────────────────────────

server.tool(
  'gather_fundamentals',
  'Fundamental analysis for a US-listed company from SEC EDGAR XBRL filings plus market data: latest income statement, balance sheet and cash flow figures with YoY trends, margins, key ratios, analyst actions and earnings surprises. Returns a markdown report.',
  {
    ticker: z.string().describe('Stock ticker symbol (e.g., CAKE)'),
    company: z.string().optional().describe('Company name for the report header'),
    theme: z.string().optional().describe('Research theme'),
    directive: z.string().optional().describe('Research directive'),
  },
  async ({ ticker, company, theme, directive }) => {
    try {
      const symbol = normalizeTicker(ticker);
      const result = await gatherFundamentals(
        { ticker: symbol, companyName: company ?? symbol, theme, directive },
        runtime.fundamentals
      );
      return { content: [{ type: 'text', text: result.markdown }] };
    } catch (err) {
      return errorResult(err);
    }
  }
);

server.tool(
  'gather_research',
  "Run a research agent's gather pipeline for one ticker: each source is gathered with error isolation, stored, and a reindex is triggered once. Returns the orchestration summary as JSON.",
  {
    ticker: z.string().describe('Stock ticker symbol'),
    name: z.string().describe('Company name'),
    agent: z.string().describe(`Agent name (${runtime.orchestrator.agentNames().join(', ')})`),
    sources: z.array(z.string()).optional().describe("Sources to run instead of the agent's defaults"),
    theme: z.string().optional(),
    directive: z.string().optional(),
    dry_run: z.boolean().optional().default(false).describe('Gather only; skip storage and reindex'),
  },
  async ({ ticker, name, agent, sources, theme, directive, dry_run }) => {
    try {
      const summary = await runtime.orchestrator.gather({
        ticker,
        companyName: name,
        agent,
        sources,
        theme,
        directive,
        dryRun: dry_run,
      });
      return {
        content: [{ type: 'text', text: renderGatherJson(summary) }],
        isError: !summary.success,
      };
    } catch (err) {
      return errorResult(err);
    }
  }
);

server.tool(
  'list_sources',
  'List the registered research sources and the default sources of each agent.',
  {},
  async () => {
    const lines = ['Sources:', ...runtime.registry.tags().map(tag => `  ${tag}`), '', 'Agents:'];
    for (const [agent, sources] of Object.entries(runtime.orchestrator.agentDefaults())) {
      lines.push(`  ${agent}: ${sources.length > 0 ? sources.join(', ') : '(none)'}`);
    }
    return { content: [{ type: 'text', text: lines.join('\n') }] };
  }
);

// ── Resources ──────────────────────────────────────────────────────────

server.resource(
  'metrics',
  'equity-gather://metrics',
  { description: 'Normalized metric taxonomy with XBRL concept aliases', mimeType: 'application/json' },
  async uri => ({
    contents: [{
      uri: uri.href,
      mimeType: 'application/json',
      text: JSON.stringify(METRIC_DEFINITIONS, null, 2),
    }],
  })
);

// ── Start ──────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
