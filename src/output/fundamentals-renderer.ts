import { formatCompact, formatSignedPct, fiscalYearLabel } from './format-utils.js';
import { latestObservation, PRIMARY_FILING_TYPE } from '../processing/calculations.js';
import { baseFilingType, isEmptyDocument } from '../processing/xbrl-processor.js';
import type { FundamentalsOutput } from '../gather/registry.js';
import type {
  CompanyProfile,
  CompanySnapshot,
  Derivations,
  MetricsDocument,
  MetricSeries,
  Observation,
  Trend,
} from '../core/types.js';

/**
 * Markdown report for one ticker.
 *
 * Section order: overview, income statement, balance sheet, cash flow,
 * analyst recommendations, earnings history. An empty metrics document
 * replaces the three financial sections with a "no data" notice.
 */

const ANNUAL_HISTORY_YEARS = 5;
const ANALYST_LINES = 5;
const EARNINGS_ROWS = 8;
const DESCRIPTION_MAX = 500;

export interface ReportHeader {
  ticker: string;
  companyName: string;
  generatedAt: string;
  cik: string | null;
  theme?: string;
  directive?: string;
}

export interface FundamentalsReport {
  ticker: string;
  doc: MetricsDocument;
  derivations: Derivations;
  snapshot: CompanySnapshot;
}

type LineSpec = [metric: string, label: string, prefix: string];

const INCOME_LINES: LineSpec[] = [
  ['revenue', 'Revenue', '$'],
  ['gross_profit', 'Gross Profit', '$'],
  ['operating_income', 'Operating Income', '$'],
  ['net_income', 'Net Income', '$'],
  ['eps_diluted', 'EPS (Diluted)', '$'],
];

const BALANCE_LINES: LineSpec[] = [
  ['total_assets', 'Total Assets', '$'],
  ['total_liabilities', 'Total Liabilities', '$'],
  ['stockholders_equity', "Stockholders' Equity", '$'],
  ['cash', 'Cash & Equivalents', '$'],
  ['long_term_debt', 'Long-Term Debt', '$'],
  ['current_assets', 'Current Assets', '$'],
  ['current_liabilities', 'Current Liabilities', '$'],
  ['shares_outstanding', 'Shares Outstanding', ''],
];

const CASH_FLOW_LINES: LineSpec[] = [
  ['operating_cash_flow', 'Operating Cash Flow', '$'],
  ['capex', 'Capital Expenditures', '$'],
  ['dividends_paid', 'Dividends Paid', '$'],
];

export function renderReportHeader(header: ReportHeader): string {
  let out = `# Fundamental Research Report: $${header.ticker} (${header.companyName})\n`;
  out += `*Generated: ${header.generatedAt}*\n`;
  if (header.cik) out += `*SEC CIK: ${header.cik}*\n`;
  if (header.theme) out += `*Theme: ${header.theme}*\n`;
  if (header.directive) out += `*Directive: ${header.directive}*\n`;
  out += '\n---\n\n';
  return out;
}

export function formatTrendMarker(trend: Trend | undefined): string {
  if (!trend) return '';
  const arrow = trend.direction === 'up' ? '📈' : trend.direction === 'down' ? '📉' : '➡️';
  return ` ${arrow} ${formatSignedPct(trend.change_pct)} YoY`;
}

function metricLines(
  section: Record<string, MetricSeries>,
  trends: Record<string, Trend>,
  specs: LineSpec[]
): string[] {
  const lines: string[] = [];
  for (const [metric, label, prefix] of specs) {
    const latest = latestObservation(section[metric]);
    if (!latest) continue;
    const value = formatCompact(latest.value, prefix);
    lines.push(`- **${label}**: ${value} (${fiscalYearLabel(latest.period_end)})${formatTrendMarker(trends[metric])}`);
  }
  return lines;
}

function renderOverview(profile: CompanyProfile): string[] {
  const lines = ['## Company Overview', ''];
  if (profile.long_name) lines.push(`**${profile.long_name}**`);

  const classification = [profile.sector, profile.industry].filter((p): p is string => p !== null);
  if (classification.length > 0) lines.push(`*${classification.join(' · ')}*`);
  lines.push('');

  if (profile.market_cap !== null) lines.push(`- **Market Cap**: ${formatCompact(profile.market_cap)}`);
  if (profile.enterprise_value !== null) lines.push(`- **Enterprise Value**: ${formatCompact(profile.enterprise_value)}`);
  if (profile.trailing_pe !== null) lines.push(`- **P/E (Trailing)**: ${profile.trailing_pe.toFixed(1)}`);
  if (profile.forward_pe !== null) lines.push(`- **P/E (Forward)**: ${profile.forward_pe.toFixed(1)}`);
  if (profile.price_to_book !== null) lines.push(`- **P/B**: ${profile.price_to_book.toFixed(2)}`);
  if (profile.dividend_yield !== null) lines.push(`- **Dividend Yield**: ${(profile.dividend_yield * 100).toFixed(2)}%`);
  if (profile.beta !== null) lines.push(`- **Beta**: ${profile.beta.toFixed(2)}`);
  if (profile.week_52_low !== null && profile.week_52_high !== null) {
    lines.push(`- **52-Week Range**: $${profile.week_52_low.toFixed(2)} - $${profile.week_52_high.toFixed(2)}`);
  }
  lines.push('');

  if (profile.description) {
    const desc = profile.description.length > DESCRIPTION_MAX
      ? profile.description.slice(0, DESCRIPTION_MAX) + '...'
      : profile.description;
    lines.push(`> ${desc}`, '');
  }
  return lines;
}

function annualOnly(series: MetricSeries | undefined): Observation[] {
  return (series ?? []).filter(obs => baseFilingType(obs.filing_type) === PRIMARY_FILING_TYPE);
}

/** One row per fiscal year (period-end year), latest entry wins */
function renderAnnualHistory(income: Record<string, MetricSeries>): string[] {
  const byYear = new Map<string, Observation>();
  for (const obs of annualOnly(income.revenue)) {
    byYear.set(obs.period_end.slice(0, 4), obs);
  }
  const rows = Array.from(byYear.values());
  if (rows.length < 2) return [];

  const netIncome = annualOnly(income.net_income);
  const eps = annualOnly(income.eps_diluted);

  const lines = [
    '### Annual Revenue History',
    '',
    '| Fiscal Year | Revenue | Net Income | EPS |',
    '|-------------|---------|------------|-----|',
  ];
  for (const row of rows.slice(-ANNUAL_HISTORY_YEARS)) {
    const ni = netIncome.find(o => o.period_end === row.period_end);
    const ep = eps.find(o => o.period_end === row.period_end);
    lines.push(
      `| ${fiscalYearLabel(row.period_end)} | ${formatCompact(row.value)} | ` +
      `${ni ? formatCompact(ni.value) : '—'} | ${ep ? formatCompact(ep.value) : '—'} |`
    );
  }
  lines.push('');
  return lines;
}

function renderIncome(report: FundamentalsReport): string[] {
  const income = report.doc.income;
  if (Object.keys(income).length === 0) return [];

  const lines = ['## Income Statement (from SEC filings)', ''];
  lines.push(...metricLines(income, report.derivations.trends.income, INCOME_LINES));

  const margins = report.derivations.margins;
  if (margins) {
    const parts: string[] = [];
    if (margins.gross !== undefined) parts.push(`Gross: ${margins.gross.toFixed(1)}%`);
    if (margins.operating !== undefined) parts.push(`Operating: ${margins.operating.toFixed(1)}%`);
    if (margins.net !== undefined) parts.push(`Net: ${margins.net.toFixed(1)}%`);
    if (parts.length > 0) lines.push(`- **Margins**: ${parts.join(' | ')}`);
  }
  lines.push('');

  lines.push(...renderAnnualHistory(income));
  return lines;
}

function renderBalanceSheet(report: FundamentalsReport): string[] {
  const balance = report.doc.balance_sheet;
  if (Object.keys(balance).length === 0) return [];

  const lines = ['## Balance Sheet (from SEC filings)', ''];
  lines.push(...metricLines(balance, report.derivations.trends.balance_sheet, BALANCE_LINES));

  const { debt_to_equity, current_ratio, net_debt } = report.derivations.ratios;
  const parts: string[] = [];
  if (debt_to_equity !== undefined) parts.push(`D/E: ${debt_to_equity.toFixed(2)}`);
  if (current_ratio !== undefined) parts.push(`Current: ${current_ratio.toFixed(2)}`);
  if (net_debt !== undefined) parts.push(`Net Debt: ${formatCompact(net_debt)}`);
  if (parts.length > 0) lines.push(`- **Key Ratios**: ${parts.join(' | ')}`);

  lines.push('');
  return lines;
}

function renderCashFlow(report: FundamentalsReport): string[] {
  const cashFlow = report.doc.cash_flow;
  if (Object.keys(cashFlow).length === 0) return [];

  const lines = ['## Cash Flow (from SEC filings)', ''];
  lines.push(...metricLines(cashFlow, report.derivations.trends.cash_flow, CASH_FLOW_LINES));

  const fcf = report.derivations.free_cash_flow;
  if (fcf !== undefined) lines.push(`- **Free Cash Flow**: ${formatCompact(fcf)}`);

  lines.push('');
  return lines;
}

function renderAnalystActions(snapshot: CompanySnapshot): string[] {
  if (snapshot.analyst_actions.length === 0) return [];
  const lines = ['## Analyst Recommendations', ''];
  for (const rec of snapshot.analyst_actions.slice(-ANALYST_LINES)) {
    lines.push(`- **${rec.firm}**: ${rec.to_grade}${rec.action ? ` (${rec.action})` : ''}`);
  }
  lines.push('');
  return lines;
}

function money(value: number | null): string {
  return value === null ? 'N/A' : `$${value.toFixed(2)}`;
}

function renderEarnings(snapshot: CompanySnapshot): string[] {
  if (snapshot.earnings_history.length === 0) return [];
  const lines = [
    '## Earnings History',
    '',
    '| Quarter | EPS Estimate | EPS Actual | Surprise |',
    '|---------|-------------|------------|----------|',
  ];
  for (const e of snapshot.earnings_history.slice(-EARNINGS_ROWS)) {
    const surprise = e.surprise_pct === null ? 'N/A' : `${e.surprise_pct.toFixed(1)}%`;
    lines.push(`| ${e.quarter_end} | ${money(e.eps_estimate)} | ${money(e.eps_actual)} | ${surprise} |`);
  }
  lines.push('');
  return lines;
}

export function renderFundamentalsMarkdown(report: FundamentalsReport): string {
  const lines = [`# Fundamental Analysis: $${report.ticker}`, ''];

  if (report.snapshot.profile) lines.push(...renderOverview(report.snapshot.profile));

  if (isEmptyDocument(report.doc)) {
    lines.push(
      '*No SEC EDGAR XBRL data found for this ticker.*',
      '*This may mean the company files under a different CIK or is not a US-listed company.*',
      ''
    );
  } else {
    lines.push(...renderIncome(report), ...renderBalanceSheet(report), ...renderCashFlow(report));
  }

  lines.push(...renderAnalystActions(report.snapshot), ...renderEarnings(report.snapshot));
  return lines.join('\n');
}

/** Machine-readable view: the metrics document with supplementary counts */
export function renderFundamentalsJson(output: FundamentalsOutput): string {
  return JSON.stringify(
    {
      ticker: output.ticker,
      company: output.company,
      timestamp: output.timestamp,
      cik: output.cik,
      metric_count: output.metric_count,
      financials: output.financials,
      derivations: output.derivations,
      supplementary: {
        profile: output.supplementary.profile,
        analyst_actions_count: output.supplementary.analyst_actions.length,
        earnings_history_count: output.supplementary.earnings_history.length,
      },
    },
    null,
    2
  );
}
