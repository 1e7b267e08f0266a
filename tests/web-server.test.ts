import { describe, it, expect, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../src/web/server.js';
import { toApiError } from '../src/web/serialization.js';
import { GatherOrchestrator } from '../src/gather/orchestrator.js';
import { SourceRegistry } from '../src/gather/registry.js';
import type { ReindexResult, StoreOutcome } from '../src/gather/sinks.js';
import type { FundamentalsDeps } from '../src/sources/fundamentals.js';
import { ResponseCache } from '../src/core/cache.js';
import { NotFoundError, RateLimitError, UnknownAgentError } from '../src/core/errors.js';
import { EMPTY_SNAPSHOT, type CompanyFacts } from '../src/core/types.js';
import { FIXED_NOW, fundamentalsOutput, socialOutput, technicalsOutput, webOutput } from './helpers/stub-sources.js';

function loadSample(): CompanyFacts {
  return JSON.parse(readFileSync(new URL('./fixtures/companyfacts-sample.json', import.meta.url), 'utf-8'));
}

describe('web API', () => {
  let server: FastifyInstance | undefined;
  let cache: ResponseCache | undefined;

  afterEach(async () => {
    await server?.close();
    cache?.close();
    server = undefined;
    cache = undefined;
  });

  function build() {
    const fundamentals: FundamentalsDeps = {
      resolver: { resolve: async ticker => (ticker === 'CAKE' ? { cik: '0000887596', ticker, name: 'Sample Dining Co' } : null) },
      facts: { getCompanyFacts: async () => loadSample() },
      supplementary: { fetchSnapshot: async () => EMPTY_SNAPSHOT },
      clock: () => FIXED_NOW,
    };
    const registry = new SourceRegistry({
      web: async req => webOutput(req, 3, 2),
      fundamentals: async req => fundamentalsOutput(req, 16),
      social: async req => socialOutput(req, 4),
      technicals: async req => technicalsOutput(req, 7),
    });
    const orchestrator = new GatherOrchestrator({
      registry,
      storage: { store: async (): Promise<StoreOutcome> => ({ success: true, key: 'k', message: 'ok' }) },
      reindex: { trigger: async (): Promise<ReindexResult> => ({ success: true, message: 'Reindex triggered' }) },
      pacingMs: 0,
      clock: () => FIXED_NOW,
    });
    cache = new ResponseCache(':memory:');
    server = buildServer({ fundamentals, orchestrator, registry, cache });
    return server;
  }

  it('serves the fundamentals document for a ticker', async () => {
    const res = await build().inject({ method: 'GET', url: '/api/fundamentals/cake?company=Sample%20Dining%20Co' });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.ticker).toBe('CAKE');
    expect(body.company).toBe('Sample Dining Co');
    expect(body.cik).toBe('0000887596');
    expect(body.metric_count).toBe(13);
    expect(body.derivations.ratios).toEqual({ debt_to_equity: 4, current_ratio: 0.75, net_debt: 337_200_000 });
    expect(typeof body.markdown).toBe('string');
  });

  it('omits the markdown on request', async () => {
    const res = await build().inject({ method: 'GET', url: '/api/fundamentals/CAKE?markdown=false' });
    expect(res.json()).not.toHaveProperty('markdown');
  });

  it('rejects an invalid ticker', async () => {
    const res = await build().inject({ method: 'GET', url: '/api/fundamentals/not%20a%20ticker' });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.type).toBe('validation');
  });

  it('runs a gather and drops markdown from the results', async () => {
    const res = await build().inject({
      method: 'POST',
      url: '/api/gather',
      payload: { ticker: 'cake', name: 'Sample Dining Co', agent: 'nova', dry_run: true },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.summary).toBe('$CAKE: 5 articles/filings, 16 financial metrics');
    expect(body.dry_run).toBe(true);
    expect(body.gather_results).toEqual([
      { source: 'web', success: true, metric_count: 5, error: null },
      { source: 'fundamentals', success: true, metric_count: 16, error: null },
    ]);
  });

  it('maps an unknown agent to 400', async () => {
    const res = await build().inject({
      method: 'POST',
      url: '/api/gather',
      payload: { ticker: 'CAKE', name: 'Sample Dining Co', agent: 'zeus' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.type).toBe('agent_not_found');
  });

  it('validates the gather body', async () => {
    const res = await build().inject({ method: 'POST', url: '/api/gather', payload: { ticker: 'CAKE' } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.type).toBe('validation');
  });

  it('lists sources with agent defaults', async () => {
    const res = await build().inject({ method: 'GET', url: '/api/sources' });
    expect(res.json()).toEqual({
      sources: ['web', 'fundamentals', 'social', 'technicals'],
      agents: { nova: ['web', 'fundamentals'], luna: ['social'], ace: ['technicals'], max: [] },
    });
  });

  it('looks a metric up by id or display name', async () => {
    const app = build();
    const res = await app.inject({ method: 'GET', url: '/api/metrics/Free%20Cash%20Flow' });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { type: 'metric_not_found', message: 'Unknown metric: "Free Cash Flow"' } });

    const found = await app.inject({ method: 'GET', url: '/api/metrics/EPS%20(Diluted)' });
    expect(found.statusCode).toBe(200);
    expect(found.json()).toMatchObject({ id: 'eps_diluted', category: 'income', unit_type: 'per_share' });
  });

  it('lists the metric taxonomy and cache stats', async () => {
    const app = build();
    const metrics = (await app.inject({ method: 'GET', url: '/api/metrics' })).json();
    expect(metrics.metrics.map((m: { id: string }) => m.id)).toContain('revenue');

    cache?.set('https://example.test/x', 'abcd');
    const stats = (await app.inject({ method: 'GET', url: '/api/cache-stats' })).json();
    expect(stats).toEqual({ entries: 1, size_bytes: 4, size_mb: '0.0' });
  });
});

describe('toApiError', () => {
  it('maps error classes to statuses', () => {
    expect(toApiError(new UnknownAgentError('zeus', ['nova'])).status).toBe(400);
    expect(toApiError(new NotFoundError('https://example.test')).status).toBe(404);
    expect(toApiError(new RateLimitError('https://example.test')).status).toBe(429);
    expect(toApiError(new Error('secret detail'))).toEqual({
      status: 500,
      body: { error: { type: 'internal', message: 'Internal server error' } },
    });
  });
});
