#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { loadConfig } from './core/config.js';
import { errorMessage } from './core/errors.js';
import { normalizeTicker } from './core/resolver.js';
import { createRuntime, type Runtime } from './runtime.js';
import { gatherFundamentals } from './sources/fundamentals.js';
import { AGENT_SOURCES } from './gather/orchestrator.js';
import { METRIC_CATEGORIES } from './core/types.js';
import { findMetric, metricsForCategory } from './processing/metric-definitions.js';
import { padRight } from './output/format-utils.js';
import { renderFundamentalsJson } from './output/fundamentals-renderer.js';
import { combinedMarkdown, renderGatherJson, renderGatherSummary } from './output/gather-renderer.js';

/** Builds the runtime, runs the action, and always closes the cache */
async function withRuntime(action: (runtime: Runtime) => Promise<void> | void): Promise<void> {
  let runtime: Runtime | null = null;
  try {
    runtime = createRuntime(loadConfig());
    await action(runtime);
  } catch (err) {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exitCode = 1;
  } finally {
    runtime?.close();
  }
}

async function writeOutput(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf-8');
  console.error(chalk.green(`Research saved to ${path}`));
}

function parseSources(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

const program = new Command();

program
  .name('equity-gather')
  .description('Normalized SEC fundamentals and multi-source research gathering for equity tickers')
  .version('0.1.0');

program
  .command('fundamentals')
  .alias('f')
  .description('Fundamental report for one ticker from SEC XBRL filings and market data')
  .argument('<ticker>', 'Stock ticker symbol (e.g., CAKE)')
  .option('-c, --company <name>', 'Company name (defaults to the ticker)')
  .option('--theme <theme>', 'Research theme')
  .option('--directive <directive>', 'Research directive')
  .option('-o, --output <file>', 'Write the markdown report to a file')
  .option('-j, --json', 'Output the metrics document as JSON')
  .action(async (tickerArg: string, options: { company?: string; theme?: string; directive?: string; output?: string; json?: boolean }) => {
    await withRuntime(async runtime => {
      const ticker = normalizeTicker(tickerArg);
      const result = await gatherFundamentals(
        { ticker, companyName: options.company ?? ticker, theme: options.theme, directive: options.directive },
        runtime.fundamentals
      );

      if (options.json) {
        console.log(renderFundamentalsJson(result));
      } else if (options.output) {
        await writeOutput(options.output, result.markdown);
      } else {
        console.log(result.markdown);
      }

      console.error(chalk.dim(
        `\nGathered ${result.metric_count} financial metrics (CIK: ${result.cik ?? 'not found'})`
      ));
    });
  });

program
  .command('gather')
  .alias('g')
  .description("Run an agent's gather pipeline: sources → storage → reindex")
  .argument('<ticker>', 'Stock ticker symbol')
  .requiredOption('-n, --name <name>', 'Company name')
  .requiredOption('-a, --agent <agent>', `Agent name (${Object.keys(AGENT_SOURCES).join(', ')})`)
  .option('-s, --sources <list>', "Comma-separated sources (default: the agent's sources)", parseSources)
  .option('--theme <theme>', 'Research theme')
  .option('--directive <directive>', 'Research directive')
  .option('--dry-run', 'Gather only; skip storage and reindex')
  .option('-o, --output <file>', 'Write the combined markdown to a file')
  .option('-j, --json', 'Output the summary as JSON')
  .action(async (tickerArg: string, options: {
    name: string;
    agent: string;
    sources?: string[];
    theme?: string;
    directive?: string;
    dryRun?: boolean;
    output?: string;
    json?: boolean;
  }) => {
    await withRuntime(async runtime => {
      const summary = await runtime.orchestrator.gather({
        ticker: tickerArg,
        companyName: options.name,
        agent: options.agent,
        sources: options.sources,
        theme: options.theme,
        directive: options.directive,
        dryRun: options.dryRun,
      });

      console.log(options.json ? renderGatherJson(summary) : renderGatherSummary(summary));

      if (options.output) {
        await writeOutput(options.output, combinedMarkdown(summary));
      }
      if (!summary.success) process.exitCode = 1;
    });
  });

program
  .command('metrics')
  .description('List the normalized metric taxonomy, or show one metric')
  .argument('[name]', 'Canonical id or display name, e.g. "net_income"')
  .action((name: string | undefined) => {
    if (name) {
      try {
        const m = findMetric(name);
        console.log(`\n${chalk.bold(m.display_name)} ${chalk.dim(`(${m.id}, ${m.category}, ${m.unit_type})`)}`);
        console.log(chalk.dim('XBRL concepts, in priority order:'));
        m.aliases.forEach((alias, i) => console.log(`  ${i + 1}. ${alias}`));
        console.log('');
      } catch (err) {
        console.error(chalk.red(`Error: ${errorMessage(err)}`));
        process.exitCode = 1;
      }
      return;
    }

    console.log(chalk.bold('\nSupported Metrics'));
    for (const category of METRIC_CATEGORIES) {
      console.log(chalk.bold(`\n${category}`));
      for (const m of metricsForCategory(category)) {
        console.log(`  ${padRight(chalk.cyan(m.id), 22)} ${m.display_name}`);
        console.log(`  ${padRight('', 22)} ${chalk.dim('XBRL: ' + m.aliases.join(', '))}`);
      }
    }
    console.log('');
  });

program
  .command('sources')
  .description('List registered sources and agent defaults')
  .action(async () => {
    await withRuntime(runtime => {
      console.log(chalk.bold('\nSources\n'));
      for (const tag of runtime.registry.tags()) {
        console.log(`  ${chalk.cyan(tag)}`);
      }
      console.log(chalk.bold('\nAgents\n'));
      for (const [agent, sources] of Object.entries(runtime.orchestrator.agentDefaults())) {
        console.log(`  ${chalk.cyan(agent.padEnd(8))} ${sources.length > 0 ? sources.join(', ') : chalk.dim('(none)')}`);
      }
      console.log('');
    });
  });

program
  .command('cache')
  .description('Manage the local response cache')
  .option('--clear', 'Clear all cached data')
  .action(async (options: { clear?: boolean }) => {
    await withRuntime(runtime => {
      if (options.clear) {
        runtime.cache.clear();
        console.log(chalk.green('Cache cleared.'));
        return;
      }
      const stats = runtime.cache.stats();
      const sizeMb = (stats.sizeBytes / 1024 / 1024).toFixed(1);
      console.log(`\n  Cache entries: ${stats.entries}`);
      console.log(`  Cache size:    ${sizeMb} MB`);
      console.log(`  Location:      ${runtime.config.cachePath}\n`);
    });
  });

await program.parseAsync();
