import { errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { EMPTY_SNAPSHOT, type CompanyFacts, type CompanySnapshot, type RegistrantInfo } from '../core/types.js';
import type { FactsProvider, RegistrantInfoProvider } from '../core/sec-client.js';
import type { IdentifierResolver } from '../core/resolver.js';
import { countMetrics, extractFinancials } from '../processing/xbrl-processor.js';
import { deriveFigures } from '../processing/calculations.js';
import { withRegistrantInfo, type SupplementaryProvider } from '../processing/supplementary.js';
import { renderFundamentalsMarkdown, renderReportHeader } from '../output/fundamentals-renderer.js';
import type { FundamentalsOutput, GatherRequest, SourceHandler } from '../gather/registry.js';

export interface FundamentalsDeps {
  resolver: IdentifierResolver;
  facts: FactsProvider;
  supplementary: SupplementaryProvider;
  /** SEC industry and description for the overview; omitted, the profile keeps only market data */
  registrant?: RegistrantInfoProvider;
  lookbackYears?: number;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * SEC XBRL financials plus the supplementary snapshot for one ticker.
 *
 * Upstream faults never propagate: an unresolved ticker or a failed facts
 * download yields an empty metrics document, which the report renders as
 * its "no data" section.
 */
export async function gatherFundamentals(request: GatherRequest, deps: FundamentalsDeps): Promise<FundamentalsOutput> {
  const logger = (deps.logger ?? silentLogger).child({ source: 'fundamentals' });
  const now = (deps.clock ?? (() => new Date()))();
  const { ticker, companyName } = request;

  const lookup = await deps.resolver.resolve(ticker);
  const cik = lookup?.cik ?? null;

  let facts: CompanyFacts | null = null;
  if (cik) {
    try {
      facts = await deps.facts.getCompanyFacts(cik);
    } catch (err) {
      logger.warn({ ticker, cik, err: errorMessage(err) }, 'company facts unavailable');
    }
  } else {
    logger.warn({ ticker }, 'no CIK found for ticker');
  }

  const financials = extractFinancials(facts, { years: deps.lookbackYears, now });
  const derivations = deriveFigures(financials);

  let supplementary: CompanySnapshot = EMPTY_SNAPSHOT;
  try {
    supplementary = await deps.supplementary.fetchSnapshot(ticker);
  } catch (err) {
    logger.warn({ ticker, err: errorMessage(err) }, 'supplementary data unavailable');
  }

  let registrant: RegistrantInfo | null = null;
  if (cik && deps.registrant) {
    try {
      registrant = await deps.registrant.getRegistrantInfo(cik);
    } catch (err) {
      logger.warn({ ticker, cik, err: errorMessage(err) }, 'registrant info unavailable');
    }
  }
  supplementary = { ...supplementary, profile: withRegistrantInfo(supplementary.profile, registrant, ticker) };

  const timestamp = now.toISOString();
  const header = renderReportHeader({
    ticker,
    companyName,
    generatedAt: timestamp,
    cik,
    theme: request.theme,
    directive: request.directive,
  });
  const body = renderFundamentalsMarkdown({ ticker, doc: financials, derivations, snapshot: supplementary });

  return {
    source: 'fundamentals',
    ticker,
    company: companyName,
    timestamp,
    markdown: header + body,
    cik,
    metric_count: countMetrics(financials),
    financials,
    derivations,
    supplementary,
    theme: request.theme ?? null,
    directive: request.directive ?? null,
  };
}

export function createFundamentalsSource(deps: FundamentalsDeps): SourceHandler<'fundamentals'> {
  return request => gatherFundamentals(request, deps);
}
