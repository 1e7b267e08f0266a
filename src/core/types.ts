/**
 * Core data model for equity-gather.
 *
 * Design principles:
 * - Observations are immutable once extracted
 * - "Latest" is derived from a series, never stored
 * - Derived figures reference Observations, never mutate them
 * - Absence means "no data found", never zero
 */

export type FilingType = '10-K' | '10-Q' | '10-K/A' | '10-Q/A';
export type BaseFilingType = '10-K' | '10-Q';

export const FILING_TYPES: readonly FilingType[] = ['10-K', '10-Q', '10-K/A', '10-Q/A'];

/** Unit kinds in the order the resolver prefers them */
export const UNIT_PRIORITY = ['USD', 'USD/shares', 'shares', 'pure'] as const;
export type UnitKind = (typeof UNIT_PRIORITY)[number];

export interface Observation {
  value: number | null;
  period_end: string;
  filing_type: FilingType;
  filed_date: string;
  fiscal_year: number | null;
  fiscal_period: string;
}

export type MetricSeries = readonly Observation[];

export type MetricCategory = 'income' | 'balance_sheet' | 'cash_flow';

export const METRIC_CATEGORIES: readonly MetricCategory[] = ['income', 'balance_sheet', 'cash_flow'];

export type MetricsDocument = Record<MetricCategory, Record<string, MetricSeries>>;

/** Raw XBRL concept entry from the SEC companyfacts API. Records stay untyped until extraction. */
export interface ConceptFacts {
  label?: string;
  description?: string;
  units?: Record<string, unknown[]>;
}

/** SEC companyfacts API response shape */
export interface CompanyFacts {
  cik?: number | string;
  entityName?: string;
  facts?: Record<string, Record<string, ConceptFacts>>;
}

/** CIK lookup result */
export interface CikLookup {
  cik: string;
  ticker: string;
  name: string;
}

/** Registrant facts from the SEC submissions index */
export interface RegistrantInfo {
  name: string | null;
  /** SIC code description, e.g. "Retail-Eating Places" */
  industry: string | null;
  description: string | null;
}

// ── Supplementary market data ─────────────────────────────────────────

export interface CompanyProfile {
  name: string;
  long_name: string | null;
  sector: string | null;
  industry: string | null;
  market_cap: number | null;
  enterprise_value: number | null;
  trailing_pe: number | null;
  forward_pe: number | null;
  price_to_book: number | null;
  dividend_yield: number | null;
  beta: number | null;
  week_52_high: number | null;
  week_52_low: number | null;
  description: string | null;
}

export interface AnalystAction {
  firm: string;
  to_grade: string;
  from_grade: string | null;
  action: string | null;
  date: string | null;
}

export interface EarningsSurprise {
  quarter_end: string;
  eps_estimate: number | null;
  eps_actual: number | null;
  surprise_pct: number | null;
}

export interface CompanySnapshot {
  profile: CompanyProfile | null;
  analyst_actions: AnalystAction[];
  earnings_history: EarningsSurprise[];
}

export const EMPTY_SNAPSHOT: CompanySnapshot = Object.freeze({
  profile: null,
  analyst_actions: [],
  earnings_history: [],
});

// ── Derived figures ───────────────────────────────────────────────────

export type TrendDirection = 'up' | 'down' | 'flat';

export interface Trend {
  previous: number;
  current: number;
  change_pct: number;
  direction: TrendDirection;
  filing_type: BaseFilingType;
}

export interface Margins {
  gross?: number;
  operating?: number;
  net?: number;
}

export interface BalanceRatios {
  debt_to_equity?: number;
  current_ratio?: number;
  net_debt?: number;
}

export interface Derivations {
  trends: Record<MetricCategory, Record<string, Trend>>;
  margins?: Margins;
  ratios: BalanceRatios;
  free_cash_flow?: number;
}

// ── Research sources ──────────────────────────────────────────────────

export interface NewsArticle {
  headline: string;
  source: string | null;
  url: string | null;
  summary: string | null;
  published: string | null;
}

export interface SocialPlatformSummary {
  platform: string;
  mentions: number;
  positive_mentions: number;
  negative_mentions: number;
  /** Mean sentiment score across the window, -1..1 */
  average_score: number | null;
}
