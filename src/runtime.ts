import { ResponseCache } from './core/cache.js';
import type { AppConfig } from './core/config.js';
import { FinnhubClient } from './core/finnhub-client.js';
import { createLogger, type Logger } from './core/logger.js';
import { CikCache, CikResolver } from './core/resolver.js';
import { SecClient } from './core/sec-client.js';
import { FinnhubSupplementaryProvider } from './processing/supplementary.js';
import { GatherOrchestrator } from './gather/orchestrator.js';
import { SourceRegistry } from './gather/registry.js';
import { FileStorageSink, HttpReindexSink } from './gather/sinks.js';
import { createFundamentalsSource, type FundamentalsDeps } from './sources/fundamentals.js';
import { createSocialSource } from './sources/social.js';
import { createTechnicalsSource } from './sources/technicals.js';
import { createWebSource } from './sources/web.js';

/**
 * Wires clients, caches, sources and sinks from configuration.
 * One runtime per process; the CLI, web server and MCP server share it.
 */

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  cache: ResponseCache;
  sec: SecClient;
  finnhub: FinnhubClient | null;
  fundamentals: FundamentalsDeps;
  registry: SourceRegistry;
  orchestrator: GatherOrchestrator;
  close(): void;
}

export function createRuntime(config: AppConfig, logger: Logger = createLogger(config.logLevel)): Runtime {
  const cache = new ResponseCache(config.cachePath);
  const http = { cache, logger, timeoutMs: config.httpTimeoutMs };

  const sec = new SecClient({ ...http, userAgent: config.secUserAgent });
  const finnhub = config.finnhubApiKey
    ? new FinnhubClient({ ...http, apiKey: config.finnhubApiKey, baseUrl: config.finnhubBaseUrl })
    : null;
  if (!finnhub) {
    logger.info('FINNHUB_API_KEY not set; supplementary, social and technicals data disabled');
  }

  const resolver = new CikResolver(sec, new CikCache(), logger);

  const fundamentals: FundamentalsDeps = {
    resolver,
    facts: sec,
    supplementary: new FinnhubSupplementaryProvider(finnhub, logger),
    registrant: sec,
    lookbackYears: config.lookbackYears,
    logger,
  };

  const registry = new SourceRegistry({
    web: createWebSource({ resolver, filings: sec, news: finnhub, logger }),
    fundamentals: createFundamentalsSource(fundamentals),
    social: createSocialSource({ sentiment: finnhub }),
    technicals: createTechnicalsSource({ market: finnhub, logger }),
  });

  const orchestrator = new GatherOrchestrator({
    registry,
    storage: new FileStorageSink(config.storageDir),
    reindex: new HttpReindexSink({
      url: config.reindexUrl,
      token: config.reindexToken,
      timeoutMs: config.httpTimeoutMs,
    }),
    pacingMs: config.pacingMs,
    logger,
  });

  return {
    config,
    logger,
    cache,
    sec,
    finnhub,
    fundamentals,
    registry,
    orchestrator,
    close: () => cache.close(),
  };
}
