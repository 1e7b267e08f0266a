import chalk from 'chalk';
import type { OrchestrationSummary } from '../gather/orchestrator.js';

/**
 * Terminal and JSON renderings of an orchestration summary.
 */

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function renderGatherSummary(summary: OrchestrationSummary): string {
  const status = summary.success ? chalk.green('✅') : chalk.red('❌');
  const dry = summary.dry_run ? chalk.yellow(' [DRY RUN]') : '';
  const lines = [`${status} ${capitalize(summary.agent)} gathered${dry}: ${chalk.bold(summary.summary)}`];

  for (const sr of summary.store_results) {
    if (sr.success) {
      lines.push(`  📦 Stored: ${sr.key}`);
    } else if (!sr.message.startsWith('Skipped')) {
      lines.push(chalk.yellow(`  ⚠️  Store (${sr.source}): ${sr.message}`));
    }
  }

  for (const gr of summary.gather_results) {
    if (!gr.success) lines.push(chalk.dim(`  ✖ ${gr.source}: ${gr.error ?? 'failed'}`));
  }

  if (summary.reindex.success) {
    lines.push(`  🔄 Reindex: ${summary.reindex.message}`);
  }

  return lines.join('\n');
}

/** Summary as JSON, without the per-source markdown */
export function renderGatherJson(summary: OrchestrationSummary): string {
  return JSON.stringify(
    {
      ...summary,
      gather_results: summary.gather_results.map(({ markdown: _markdown, ...rest }) => rest),
    },
    null,
    2
  );
}

/** Successful source documents joined for a single output file */
export function combinedMarkdown(summary: OrchestrationSummary): string {
  return summary.gather_results
    .filter(gr => gr.success && gr.markdown)
    .map(gr => gr.markdown)
    .join('\n\n---\n\n');
}
