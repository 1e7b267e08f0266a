import { describe, it, expect, vi } from 'vitest';
import { GatherOrchestrator, buildDigest, sourceLabel, type OrchestratorOptions } from '../src/gather/orchestrator.js';
import { SourceRegistry, type GatherRequest, type SourceHandlers, type WebOutput } from '../src/gather/registry.js';
import {
  storageKey,
  type ReindexResult,
  type StoreInput,
  type StoreOutcome,
} from '../src/gather/sinks.js';
import { UnknownAgentError, UnknownSourceError } from '../src/core/errors.js';
import {
  FIXED_NOW,
  fundamentalsOutput,
  socialOutput,
  technicalsOutput,
  webOutput,
} from './helpers/stub-sources.js';

function setup(handlers: SourceHandlers = {}, overrides: Partial<OrchestratorOptions> = {}) {
  const web = vi.fn(async (req: GatherRequest) => webOutput(req, 3, 2));
  const fundamentals = vi.fn(async (req: GatherRequest) => fundamentalsOutput(req, 16));
  const social = vi.fn(async (req: GatherRequest) => socialOutput(req, 42));
  const technicals = vi.fn(async (req: GatherRequest) => technicalsOutput(req, 7));
  const registry = new SourceRegistry({ web, fundamentals, social, technicals, ...handlers });

  const store = vi.fn(async (input: StoreInput): Promise<StoreOutcome> => {
    const key = storageKey(input.ticker, input.source, input.timestamp);
    return { success: true, key, message: `Stored ${input.content.length} chars at ${key}` };
  });
  const trigger = vi.fn(async (): Promise<ReindexResult> => ({ success: true, message: 'Reindex triggered' }));
  const sleep = vi.fn(async (_ms: number) => {});

  const orchestrator = new GatherOrchestrator({
    registry,
    storage: { store },
    reindex: { trigger },
    sleep,
    clock: () => FIXED_NOW,
    ...overrides,
  });
  return { orchestrator, web, fundamentals, social, technicals, store, trigger, sleep };
}

const failingWeb = async (_req: GatherRequest): Promise<WebOutput> => {
  throw new Error('news feed down');
};

describe('GatherOrchestrator', () => {
  it('gathers, stores and reindexes every default source of an agent', async () => {
    const { orchestrator, store, trigger } = setup();
    const summary = await orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'nova' });

    expect(summary.sources).toEqual(['web', 'fundamentals']);
    expect(summary.gather_results.map(r => [r.source, r.success, r.metric_count])).toEqual([
      ['web', true, 5],
      ['fundamentals', true, 16],
    ]);
    expect(store).toHaveBeenCalledTimes(2);
    expect(summary.store_results.map(r => r.key)).toEqual([
      'research/2025-06-01/CAKE_web.md',
      'research/2025-06-01/CAKE_fundamentals.md',
    ]);
    expect(trigger).toHaveBeenCalledTimes(1);
    expect(summary.reindex).toEqual({ success: true, message: 'Reindex triggered' });
    expect(summary.summary).toBe('$CAKE: 5 articles/filings, 16 financial metrics');
    expect(summary.success).toBe(true);
    expect(summary.dry_run).toBe(false);
    expect(summary.timestamp).toBe('2025-06-01T12:00:00.000Z');
  });

  it('normalizes the ticker and passes the request fields to each source', async () => {
    const { orchestrator, fundamentals } = setup();
    const summary = await orchestrator.gather({
      ticker: ' $cake ',
      companyName: 'Sample Dining Co',
      agent: 'nova',
      sources: ['fundamentals'],
      theme: 'margins',
    });
    expect(summary.ticker).toBe('CAKE');
    expect(fundamentals).toHaveBeenCalledWith({
      ticker: 'CAKE',
      companyName: 'Sample Dining Co',
      theme: 'margins',
      directive: undefined,
    });
  });

  it('isolates a failing source and still stores the others', async () => {
    const { orchestrator, store, trigger } = setup({ web: failingWeb });
    const summary = await orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'nova' });

    expect(summary.gather_results[0]).toEqual({
      source: 'web',
      success: false,
      markdown: '',
      metric_count: 0,
      error: 'news feed down',
    });
    expect(summary.store_results[0]).toEqual({
      source: 'web',
      success: false,
      key: '',
      message: 'Skipped: web gather failed',
    });
    expect(store).toHaveBeenCalledTimes(1);
    expect(trigger).toHaveBeenCalledTimes(1);
    expect(summary.summary).toBe('$CAKE: 16 financial metrics (failed: web)');
    expect(summary.success).toBe(true);
  });

  it('skips the reindex when nothing was stored', async () => {
    const { orchestrator, trigger } = setup({
      web: failingWeb,
      fundamentals: async () => {
        throw new Error('SEC unavailable');
      },
    });
    const summary = await orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'nova' });

    expect(trigger).not.toHaveBeenCalled();
    expect(summary.reindex).toEqual({ success: false, message: 'No data stored — skipping reindex' });
    expect(summary.summary).toBe('$CAKE: no data gathered (failed: web, fundamentals)');
    expect(summary.success).toBe(false);
  });

  it('does not store a successful source with empty content', async () => {
    const { orchestrator, store, trigger } = setup({
      web: failingWeb,
      fundamentals: async req => fundamentalsOutput(req, 0, ''),
    });
    const summary = await orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'nova' });

    expect(summary.store_results[1].message).toBe('Skipped: fundamentals returned no content');
    expect(store).not.toHaveBeenCalled();
    expect(trigger).not.toHaveBeenCalled();
    expect(summary.success).toBe(true);
  });

  it('turns store faults into failed store results', async () => {
    const store = vi.fn(async (input: StoreInput): Promise<StoreOutcome> => {
      if (input.source === 'web') throw new Error('disk full');
      return { success: true, key: 'k', message: 'ok' };
    });
    const { orchestrator, trigger } = setup({}, { storage: { store } });
    const summary = await orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'nova' });

    expect(summary.store_results[0]).toEqual({ source: 'web', success: false, key: '', message: 'Upload failed: disk full' });
    expect(summary.store_results[1].success).toBe(true);
    expect(trigger).toHaveBeenCalledTimes(1);
  });

  it('turns a reindex fault into a failed reindex result', async () => {
    const trigger = vi.fn(async (): Promise<ReindexResult> => {
      throw new Error('socket hang up');
    });
    const { orchestrator } = setup({}, { reindex: { trigger } });
    const summary = await orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'nova' });

    expect(summary.reindex).toEqual({ success: false, message: 'Reindex failed: socket hang up' });
    expect(summary.success).toBe(true);
  });

  it('gathers but neither stores nor reindexes on a dry run', async () => {
    const { orchestrator, store, trigger } = setup();
    const summary = await orchestrator.gather({
      ticker: 'CAKE',
      companyName: 'Sample Dining Co',
      agent: 'nova',
      dryRun: true,
    });

    expect(store).not.toHaveBeenCalled();
    expect(trigger).not.toHaveBeenCalled();
    expect(summary.store_results.map(r => r.message)).toEqual([
      '[DRY RUN] Would upload to research/2025-06-01/CAKE_web.md',
      '[DRY RUN] Would upload to research/2025-06-01/CAKE_fundamentals.md',
    ]);
    expect(summary.reindex).toEqual({ success: true, message: '[DRY RUN] Would trigger reindex' });
    expect(summary.dry_run).toBe(true);
  });

  it('returns a no-sources summary for an agent without defaults', async () => {
    const { orchestrator, web, fundamentals, social, technicals, store, trigger } = setup();
    const summary = await orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'max' });

    expect(summary.summary).toBe("No sources configured for agent 'max'");
    expect(summary.reindex).toEqual({ success: false, message: 'No sources to gather' });
    expect(summary.success).toBe(false);
    expect(summary.gather_results).toEqual([]);
    for (const spy of [web, fundamentals, social, technicals, store, trigger]) {
      expect(spy).not.toHaveBeenCalled();
    }
  });

  it('rejects an unknown agent before calling any source', async () => {
    const { orchestrator, web } = setup();
    await expect(
      orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'zeus' })
    ).rejects.toBeInstanceOf(UnknownAgentError);
    await expect(
      orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'toString' })
    ).rejects.toBeInstanceOf(UnknownAgentError);
    expect(web).not.toHaveBeenCalled();
  });

  it('rejects unknown explicit sources before calling any source', async () => {
    const { orchestrator, web } = setup();
    await expect(
      orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'nova', sources: ['web', 'tarot'] })
    ).rejects.toBeInstanceOf(UnknownSourceError);
    expect(web).not.toHaveBeenCalled();
  });

  it('runs explicit sources in the given order instead of the defaults', async () => {
    const { orchestrator, social, web } = setup();
    const summary = await orchestrator.gather({
      ticker: 'CAKE',
      companyName: 'Sample Dining Co',
      agent: 'nova',
      sources: ['technicals', 'social'],
    });
    expect(summary.sources).toEqual(['technicals', 'social']);
    expect(summary.summary).toBe('$CAKE: 7 technical signals, 42 social posts');
    expect(social).toHaveBeenCalledTimes(1);
    expect(web).not.toHaveBeenCalled();
  });

  it('paces between consecutive sources only', async () => {
    const { orchestrator, sleep } = setup({}, { pacingMs: 250 });
    await orchestrator.gather({
      ticker: 'CAKE',
      companyName: 'Sample Dining Co',
      agent: 'nova',
      sources: ['web', 'fundamentals', 'social'],
    });
    expect(sleep.mock.calls).toEqual([[250], [250]]);
  });

  it('does not pace when pacing is disabled', async () => {
    const { orchestrator, sleep } = setup({}, { pacingMs: 0 });
    await orchestrator.gather({ ticker: 'CAKE', companyName: 'Sample Dining Co', agent: 'nova' });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('refuses agent defaults that name unregistered sources', () => {
    const registry = new SourceRegistry({ web: async req => webOutput(req, 1, 0) });
    const noop = {
      storage: { store: async (): Promise<StoreOutcome> => ({ success: true, key: '', message: '' }) },
      reindex: { trigger: async (): Promise<ReindexResult> => ({ success: true, message: '' }) },
    };
    expect(() => new GatherOrchestrator({ registry, ...noop })).toThrow(UnknownSourceError);
    expect(() => new GatherOrchestrator({ registry, ...noop, agents: { scout: ['web'] } })).not.toThrow();
  });
});

describe('buildDigest', () => {
  it('labels each source by its count', () => {
    expect(sourceLabel('social', 12)).toBe('12 social posts');
    expect(sourceLabel('custom', 3)).toBe('3 items from custom');
  });

  it('omits the failed clause when everything succeeded', () => {
    expect(buildDigest('CAKE', [
      { source: 'technicals', success: true, markdown: 'x', metric_count: 7 },
    ])).toBe('$CAKE: 7 technical signals');
  });
});
