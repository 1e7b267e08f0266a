import { formatSignedPct } from './format-utils.js';
import type { FilingSummary } from '../core/sec-client.js';
import type { NewsArticle, SocialPlatformSummary } from '../core/types.js';
import type { GatherRequest, TechnicalSignal } from '../gather/registry.js';

/**
 * Markdown for the web, social and technicals sources. Each document starts
 * with the same header block as the fundamentals report.
 */

const SUMMARY_MAX = 280;

export function renderSourceHeader(title: string, request: GatherRequest, generatedAt: string): string {
  let out = `# ${title}: $${request.ticker} (${request.companyName})\n`;
  out += `*Generated: ${generatedAt}*\n`;
  if (request.theme) out += `*Theme: ${request.theme}*\n`;
  if (request.directive) out += `*Directive: ${request.directive}*\n`;
  out += '\n---\n\n';
  return out;
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + '...' : text;
}

export function renderWebMarkdown(filings: readonly FilingSummary[], articles: readonly NewsArticle[]): string {
  const lines: string[] = [];

  lines.push('## Recent SEC Filings', '');
  if (filings.length === 0) {
    lines.push('*No recent filings found.*');
  }
  for (const f of filings) {
    const desc = f.description ? `: ${f.description}` : '';
    const link = f.url ? ` ([document](${f.url}))` : '';
    lines.push(`- **${f.form}** (${f.filing_date})${desc}${link}`);
  }
  lines.push('');

  lines.push('## Recent News', '');
  if (articles.length === 0) {
    lines.push('*No recent news found.*');
  }
  for (const a of articles) {
    const title = a.url ? `[${a.headline}](${a.url})` : a.headline;
    const meta = [a.source, a.published].filter((m): m is string => m !== null).join(', ');
    lines.push(`- ${title}${meta ? ` (${meta})` : ''}`);
    if (a.summary) lines.push(`  > ${truncate(a.summary, SUMMARY_MAX)}`);
  }
  lines.push('');

  return lines.join('\n');
}

export function renderSocialMarkdown(platforms: readonly SocialPlatformSummary[], windowDays: number): string {
  const lines = [`## Social Sentiment (last ${windowDays} days)`, ''];
  if (platforms.length === 0) {
    lines.push('*No social mentions found.*', '');
    return lines.join('\n');
  }

  lines.push(
    '| Platform | Mentions | Positive | Negative | Avg Score |',
    '|----------|----------|----------|----------|-----------|'
  );
  for (const p of platforms) {
    const score = p.average_score === null ? 'N/A' : p.average_score.toFixed(2);
    lines.push(`| ${p.platform} | ${p.mentions} | ${p.positive_mentions} | ${p.negative_mentions} | ${score} |`);
  }
  lines.push('');
  return lines.join('\n');
}

const BIAS_MARKER: Record<TechnicalSignal['bias'], string> = {
  bullish: '🟢',
  bearish: '🔴',
  neutral: '⚪',
};

export function renderTechnicalsMarkdown(price: number, changePct: number | null, signals: readonly TechnicalSignal[]): string {
  const change = changePct === null ? '' : ` (${formatSignedPct(changePct)} today)`;
  const lines = ['## Price', '', `- **Last**: $${price.toFixed(2)}${change}`, '', '## Signals', ''];
  for (const s of signals) {
    lines.push(`- ${BIAS_MARKER[s.bias]} **${s.name}**: ${s.value}`);
  }
  lines.push('');
  return lines.join('\n');
}
