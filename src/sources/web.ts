import { z } from 'zod';
import { errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type { FinnhubClient } from '../core/finnhub-client.js';
import type { FilingSummary, SecClient } from '../core/sec-client.js';
import type { IdentifierResolver } from '../core/resolver.js';
import type { NewsArticle } from '../core/types.js';
import { toIsoDate } from '../processing/supplementary.js';
import { renderSourceHeader, renderWebMarkdown } from '../output/research-renderer.js';
import type { GatherRequest, SourceHandler, WebOutput } from '../gather/registry.js';

export const WEB_FILING_FORMS = ['10-K', '10-Q', '8-K', '10-K/A', '10-Q/A', 'DEF 14A'];
const MAX_FILINGS = 10;
const MAX_ARTICLES = 15;
const NEWS_WINDOW_DAYS = 7;

export type FilingsProvider = Pick<SecClient, 'getRecentFilings'>;
export type NewsApi = Pick<FinnhubClient, 'companyNews'>;

export interface WebDeps {
  resolver: IdentifierResolver;
  filings: FilingsProvider;
  /** Null when no news provider is configured */
  news: NewsApi | null;
  clock?: () => Date;
  logger?: Logger;
}

const newsSchema = z.array(
  z.object({
    headline: z.string(),
    source: z.string().nullish(),
    url: z.string().nullish(),
    summary: z.string().nullish(),
    datetime: z.unknown(),
  })
);

export function parseNews(raw: unknown): NewsArticle[] {
  const parsed = newsSchema.safeParse(raw);
  if (!parsed.success) return [];
  return parsed.data
    .filter(a => a.headline.trim() !== '')
    .map(a => ({
      headline: a.headline.trim(),
      source: a.source || null,
      url: a.url || null,
      summary: a.summary || null,
      published: toIsoDate(a.datetime),
    }));
}

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Recent SEC filings and company news. Either half may fail on its own;
 * the source fails only when both do.
 */
export async function gatherWeb(request: GatherRequest, deps: WebDeps): Promise<WebOutput> {
  const logger = (deps.logger ?? silentLogger).child({ source: 'web' });
  const now = (deps.clock ?? (() => new Date()))();
  const { ticker } = request;
  const faults: string[] = [];

  let filings: FilingSummary[] = [];
  const lookup = await deps.resolver.resolve(ticker);
  if (!lookup) {
    faults.push(`no CIK found for ${ticker}`);
  } else {
    try {
      filings = (await deps.filings.getRecentFilings(lookup.cik, WEB_FILING_FORMS)).slice(0, MAX_FILINGS);
    } catch (err) {
      faults.push(`filings: ${errorMessage(err)}`);
    }
  }

  let articles: NewsArticle[] = [];
  if (!deps.news) {
    faults.push('news: no provider configured');
  } else {
    const from = isoDay(new Date(now.getTime() - NEWS_WINDOW_DAYS * 86_400_000));
    try {
      articles = parseNews(await deps.news.companyNews(ticker, from, isoDay(now))).slice(0, MAX_ARTICLES);
    } catch (err) {
      faults.push(`news: ${errorMessage(err)}`);
    }
  }

  if (faults.length >= 2) {
    throw new Error(`No web data for ${ticker}: ${faults.join('; ')}`);
  }
  for (const fault of faults) {
    logger.warn({ ticker, err: fault }, 'web sub-source unavailable');
  }

  const timestamp = now.toISOString();
  return {
    source: 'web',
    ticker,
    company: request.companyName,
    timestamp,
    markdown: renderSourceHeader('Web Research', request, timestamp) + renderWebMarkdown(filings, articles),
    article_count: articles.length,
    filing_count: filings.length,
  };
}

export function createWebSource(deps: WebDeps): SourceHandler<'web'> {
  return request => gatherWeb(request, deps);
}
