import { UnknownMetricError } from '../core/errors.js';
import type { MetricCategory } from '../core/types.js';

/**
 * The normalized metric taxonomy.
 *
 * Aliases are us-gaap concept names ordered by priority (try first wins).
 * Several exist per metric because filers use different tags for the same
 * economic meaning across industries and taxonomy years.
 */

export interface MetricDefinition {
  id: string;
  display_name: string;
  category: MetricCategory;
  unit_type: 'currency' | 'per_share' | 'shares';
  aliases: readonly string[];
}

export const METRIC_DEFINITIONS: readonly MetricDefinition[] = [
  // Income statement
  {
    id: 'revenue',
    display_name: 'Revenue',
    category: 'income',
    unit_type: 'currency',
    aliases: [
      'RevenueFromContractWithCustomerExcludingAssessedTax',
      'RevenueFromContractWithCustomerIncludingAssessedTax',
      'Revenues',
      'SalesRevenueNet',
      'SalesRevenueGoodsNet',
    ],
  },
  {
    id: 'cost_of_revenue',
    display_name: 'Cost of Revenue',
    category: 'income',
    unit_type: 'currency',
    aliases: ['CostOfGoodsAndServicesSold', 'CostOfRevenue', 'CostOfGoodsSold'],
  },
  { id: 'gross_profit', display_name: 'Gross Profit', category: 'income', unit_type: 'currency', aliases: ['GrossProfit'] },
  { id: 'operating_income', display_name: 'Operating Income', category: 'income', unit_type: 'currency', aliases: ['OperatingIncomeLoss'] },
  { id: 'net_income', display_name: 'Net Income', category: 'income', unit_type: 'currency', aliases: ['NetIncomeLoss', 'ProfitLoss'] },
  { id: 'eps_basic', display_name: 'EPS (Basic)', category: 'income', unit_type: 'per_share', aliases: ['EarningsPerShareBasic'] },
  { id: 'eps_diluted', display_name: 'EPS (Diluted)', category: 'income', unit_type: 'per_share', aliases: ['EarningsPerShareDiluted'] },

  // Balance sheet
  { id: 'total_assets', display_name: 'Total Assets', category: 'balance_sheet', unit_type: 'currency', aliases: ['Assets'] },
  { id: 'total_liabilities', display_name: 'Total Liabilities', category: 'balance_sheet', unit_type: 'currency', aliases: ['Liabilities'] },
  {
    id: 'stockholders_equity',
    display_name: "Stockholders' Equity",
    category: 'balance_sheet',
    unit_type: 'currency',
    aliases: ['StockholdersEquity', 'StockholdersEquityIncludingPortionAttributableToNoncontrollingInterest'],
  },
  {
    id: 'cash',
    display_name: 'Cash & Equivalents',
    category: 'balance_sheet',
    unit_type: 'currency',
    aliases: ['CashAndCashEquivalentsAtCarryingValue', 'CashCashEquivalentsAndShortTermInvestments', 'Cash'],
  },
  {
    id: 'long_term_debt',
    display_name: 'Long-Term Debt',
    category: 'balance_sheet',
    unit_type: 'currency',
    aliases: ['LongTermDebt', 'LongTermDebtNoncurrent', 'LongTermDebtAndCapitalLeaseObligations'],
  },
  { id: 'short_term_debt', display_name: 'Short-Term Debt', category: 'balance_sheet', unit_type: 'currency', aliases: ['ShortTermBorrowings', 'DebtCurrent'] },
  { id: 'current_assets', display_name: 'Current Assets', category: 'balance_sheet', unit_type: 'currency', aliases: ['AssetsCurrent'] },
  { id: 'current_liabilities', display_name: 'Current Liabilities', category: 'balance_sheet', unit_type: 'currency', aliases: ['LiabilitiesCurrent'] },
  {
    id: 'shares_outstanding',
    display_name: 'Shares Outstanding',
    category: 'balance_sheet',
    unit_type: 'shares',
    aliases: ['CommonStockSharesOutstanding', 'EntityCommonStockSharesOutstanding'],
  },

  // Cash flow
  {
    id: 'operating_cash_flow',
    display_name: 'Operating Cash Flow',
    category: 'cash_flow',
    unit_type: 'currency',
    aliases: ['NetCashProvidedByOperatingActivities', 'NetCashProvidedByUsedInOperatingActivities'],
  },
  {
    id: 'capex',
    display_name: 'Capital Expenditures',
    category: 'cash_flow',
    unit_type: 'currency',
    aliases: ['PaymentsToAcquirePropertyPlantAndEquipment', 'PaymentsToAcquireProductiveAssets'],
  },
  {
    id: 'dividends_paid',
    display_name: 'Dividends Paid',
    category: 'cash_flow',
    unit_type: 'currency',
    aliases: ['PaymentsOfDividends', 'PaymentsOfDividendsCommonStock'],
  },
];

/** Metrics of one category, in taxonomy order */
export function metricsForCategory(category: MetricCategory): MetricDefinition[] {
  return METRIC_DEFINITIONS.filter(m => m.category === category);
}

/**
 * Lookup by canonical id or display name (case-insensitive).
 * Throws for names outside the taxonomy.
 */
export function findMetric(name: string): MetricDefinition {
  const lower = name.trim().toLowerCase();
  const found = METRIC_DEFINITIONS.find(
    m => m.id === lower || m.display_name.toLowerCase() === lower
  );
  if (!found) {
    throw new UnknownMetricError(name, METRIC_DEFINITIONS.map(m => m.id));
  }
  return found;
}
