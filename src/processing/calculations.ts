import { baseFilingType } from './xbrl-processor.js';
import {
  METRIC_CATEGORIES,
  type BalanceRatios,
  type BaseFilingType,
  type Derivations,
  type Margins,
  type MetricsDocument,
  type MetricSeries,
  type Observation,
  type Trend,
} from '../core/types.js';

/**
 * Derived figures: trends, margins, balance-sheet ratios and free cash flow.
 *
 * Every figure is computed from the latest Observation per metric (annual
 * preferred) and is omitted, never zero-filled, when an input is missing or
 * a denominator is zero.
 */

export const PRIMARY_FILING_TYPE: BaseFilingType = '10-K';

function ofType(series: MetricSeries, type: BaseFilingType): Observation[] {
  return series.filter(obs => baseFilingType(obs.filing_type) === type);
}

/**
 * Most recent Observation of the primary filing type, falling back to the
 * most recent of any type.
 */
export function latestObservation(
  series: MetricSeries | undefined,
  primary: BaseFilingType = PRIMARY_FILING_TYPE
): Observation | undefined {
  if (!series || series.length === 0) return undefined;
  const preferred = ofType(series, primary);
  return preferred.length > 0 ? preferred[preferred.length - 1] : series[series.length - 1];
}

/**
 * Latest value, or undefined when the metric or its value is absent.
 * A null latest value does not fall back to an older period: figures built
 * on it are omitted rather than computed from stale data.
 */
export function latestValue(series: MetricSeries | undefined): number | undefined {
  return latestObservation(series)?.value ?? undefined;
}

/**
 * Percent change relative to |previous|, rounded to one decimal.
 * Null for a zero previous value.
 */
export function calculateChangePct(current: number, previous: number): number | null {
  if (previous === 0) return null;
  const change = ((current - previous) / Math.abs(previous)) * 100;
  return isFinite(change) ? Math.round(change * 10) / 10 : null;
}

/** Change between the two most recent Observations of one filing type */
export function computeTrend(
  series: MetricSeries | undefined,
  filingType: BaseFilingType = PRIMARY_FILING_TYPE
): Trend | null {
  if (!series) return null;
  const filtered = ofType(series, filingType);
  if (filtered.length < 2) return null;

  const previous = filtered[filtered.length - 2].value;
  const current = filtered[filtered.length - 1].value;
  if (previous === null || current === null) return null;

  const change_pct = calculateChangePct(current, previous);
  if (change_pct === null) return null;

  const raw = current - previous;
  return {
    previous,
    current,
    change_pct,
    direction: raw > 0 ? 'up' : raw < 0 ? 'down' : 'flat',
    filing_type: filingType,
  };
}

/**
 * Gross, operating and net margin in percent. Undefined unless the latest
 * revenue is strictly positive; each margin is independent of the others.
 */
export function computeMargins(income: Record<string, MetricSeries>): Margins | undefined {
  const revenue = latestValue(income.revenue);
  if (revenue === undefined || revenue <= 0) return undefined;

  const margins: Margins = {};
  const gross = latestValue(income.gross_profit);
  const operating = latestValue(income.operating_income);
  const net = latestValue(income.net_income);

  if (gross !== undefined) margins.gross = (gross / revenue) * 100;
  if (operating !== undefined) margins.operating = (operating / revenue) * 100;
  if (net !== undefined) margins.net = (net / revenue) * 100;

  return margins;
}

export function computeBalanceRatios(balance: Record<string, MetricSeries>): BalanceRatios {
  const ratios: BalanceRatios = {};

  const liabilities = latestValue(balance.total_liabilities);
  const equity = latestValue(balance.stockholders_equity);
  if (liabilities !== undefined && equity !== undefined && equity !== 0) {
    ratios.debt_to_equity = liabilities / equity;
  }

  const currentAssets = latestValue(balance.current_assets);
  const currentLiabilities = latestValue(balance.current_liabilities);
  if (currentAssets !== undefined && currentLiabilities !== undefined && currentLiabilities !== 0) {
    ratios.current_ratio = currentAssets / currentLiabilities;
  }

  // Absent cash is not treated as zero
  const longTermDebt = latestValue(balance.long_term_debt);
  const cash = latestValue(balance.cash);
  if (longTermDebt !== undefined && cash !== undefined) {
    ratios.net_debt = longTermDebt - cash;
  }

  return ratios;
}

/** Operating cash flow minus |capex|; capex sign conventions vary by filer */
export function computeFreeCashFlow(cashFlow: Record<string, MetricSeries>): number | undefined {
  const ocf = latestValue(cashFlow.operating_cash_flow);
  const capex = latestValue(cashFlow.capex);
  if (ocf === undefined || capex === undefined) return undefined;
  return ocf - Math.abs(capex);
}

export function deriveFigures(doc: MetricsDocument): Derivations {
  const trends: Derivations['trends'] = { income: {}, balance_sheet: {}, cash_flow: {} };
  for (const category of METRIC_CATEGORIES) {
    for (const [metric, series] of Object.entries(doc[category])) {
      const trend = computeTrend(series);
      if (trend) trends[category][metric] = trend;
    }
  }

  const derivations: Derivations = { trends, ratios: computeBalanceRatios(doc.balance_sheet) };

  const margins = computeMargins(doc.income);
  if (margins) derivations.margins = margins;

  const fcf = computeFreeCashFlow(doc.cash_flow);
  if (fcf !== undefined) derivations.free_cash_flow = fcf;

  return derivations;
}
