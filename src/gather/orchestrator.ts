import { UnknownAgentError, UnknownSourceError, errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { sleep as defaultSleep, type Sleep } from '../core/rate-limiter.js';
import { normalizeTicker } from '../core/resolver.js';
import { runSource, type GatherResult } from './source-runner.js';
import { storageKey, type ReindexResult, type ReindexSink, type StorageSink } from './sinks.js';
import type { SourceRegistry, SourceTag } from './registry.js';

/**
 * Gather orchestrator: one ticker, one agent.
 *
 *   resolve sources → gather (sequential, paced) → stage persistence
 *     → reindex (only if something was stored) → digest
 *
 * A failing source never stops the others. Store and reindex faults become
 * failed results. Only an unknown agent or source name throws, and it does
 * so before any source is called.
 */

export type AgentName = 'nova' | 'luna' | 'ace' | 'max';

/** Default sources per research agent */
export const AGENT_SOURCES: Readonly<Record<AgentName, readonly SourceTag[]>> = {
  nova: ['web', 'fundamentals'],
  luna: ['social'],
  ace: ['technicals'],
  max: [],
};

export const DEFAULT_PACING_MS = 200;

export interface StoreResult {
  source: string;
  success: boolean;
  key: string;
  message: string;
}

export interface OrchestrationSummary {
  ticker: string;
  company: string;
  agent: string;
  timestamp: string;
  sources: string[];
  gather_results: GatherResult[];
  store_results: StoreResult[];
  reindex: ReindexResult;
  summary: string;
  success: boolean;
  dry_run: boolean;
}

export interface GatherInvocation {
  ticker: string;
  companyName: string;
  agent: string;
  /** Overrides the agent's defaults */
  sources?: readonly string[];
  theme?: string;
  directive?: string;
  dryRun?: boolean;
}

export interface OrchestratorOptions {
  registry: SourceRegistry;
  storage: StorageSink;
  reindex: ReindexSink;
  agents?: Readonly<Record<string, readonly string[]>>;
  pacingMs?: number;
  sleep?: Sleep;
  clock?: () => Date;
  logger?: Logger;
}

export function sourceLabel(source: string, count: number): string {
  switch (source) {
    case 'web':
      return `${count} articles/filings`;
    case 'fundamentals':
      return `${count} financial metrics`;
    case 'social':
      return `${count} social posts`;
    case 'technicals':
      return `${count} technical signals`;
    default:
      return `${count} items from ${source}`;
  }
}

/** `$T: a, b (failed: x, y)`; the failed clause only when something failed */
export function buildDigest(ticker: string, results: readonly GatherResult[]): string {
  const labels = results.filter(r => r.success).map(r => sourceLabel(r.source, r.metric_count));
  const failed = results.filter(r => !r.success).map(r => r.source);

  let digest = labels.length > 0 ? `$${ticker}: ${labels.join(', ')}` : `$${ticker}: no data gathered`;
  if (failed.length > 0) digest += ` (failed: ${failed.join(', ')})`;
  return digest;
}

export class GatherOrchestrator {
  private readonly registry: SourceRegistry;
  private readonly storage: StorageSink;
  private readonly reindexSink: ReindexSink;
  private readonly agents: Readonly<Record<string, readonly string[]>>;
  private readonly pacingMs: number;
  private readonly sleep: Sleep;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.storage = options.storage;
    this.reindexSink = options.reindex;
    this.agents = options.agents ?? AGENT_SOURCES;
    this.pacingMs = options.pacingMs ?? DEFAULT_PACING_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? (() => new Date());
    this.logger = (options.logger ?? silentLogger).child({ component: 'gather' });

    const unregistered = new Set<string>();
    for (const sources of Object.values(this.agents)) {
      for (const source of sources) {
        if (!this.registry.has(source)) unregistered.add(source);
      }
    }
    if (unregistered.size > 0) {
      throw new UnknownSourceError([...unregistered], this.registry.tags());
    }
  }

  agentNames(): string[] {
    return Object.keys(this.agents);
  }

  /** Default sources of every agent */
  agentDefaults(): Readonly<Record<string, readonly string[]>> {
    return this.agents;
  }

  /** Sources that would run for an agent, after validation */
  resolveSources(agent: string, explicit?: readonly string[]): string[] {
    const defaults = Object.hasOwn(this.agents, agent) ? this.agents[agent] : undefined;
    if (!defaults) {
      throw new UnknownAgentError(agent, this.agentNames());
    }
    if (explicit === undefined) return [...defaults];

    const unknown = explicit.filter(s => !this.registry.has(s));
    if (unknown.length > 0) {
      throw new UnknownSourceError(unknown, this.registry.tags());
    }
    return [...explicit];
  }

  async gather(invocation: GatherInvocation): Promise<OrchestrationSummary> {
    const ticker = normalizeTicker(invocation.ticker);
    const { companyName, agent } = invocation;
    const dryRun = invocation.dryRun ?? false;
    const sources = this.resolveSources(agent, invocation.sources);
    const timestamp = this.clock().toISOString();

    const base = { ticker, company: companyName, agent, timestamp, dry_run: dryRun };

    if (sources.length === 0) {
      return {
        ...base,
        sources: [],
        gather_results: [],
        store_results: [],
        reindex: { success: false, message: 'No sources to gather' },
        summary: `No sources configured for agent '${agent}'`,
        success: false,
      };
    }

    const request = {
      ticker,
      companyName,
      theme: invocation.theme,
      directive: invocation.directive,
    };

    const gatherResults: GatherResult[] = [];
    for (const [index, source] of sources.entries()) {
      if (index > 0 && this.pacingMs > 0) {
        await this.sleep(this.pacingMs);
      }
      this.logger.debug({ ticker, source }, 'gathering');
      gatherResults.push(await runSource(this.registry, source, request, this.logger));
    }

    const storeResults: StoreResult[] = [];
    for (const result of gatherResults) {
      storeResults.push(await this.stage(ticker, timestamp, result, dryRun));
    }

    const reindex = await this.triggerReindex(storeResults, dryRun);
    const summary = buildDigest(ticker, gatherResults);
    const success = gatherResults.some(r => r.success);

    this.logger.info({ ticker, agent, success, dryRun }, summary);

    return {
      ...base,
      sources,
      gather_results: gatherResults,
      store_results: storeResults,
      reindex,
      summary,
      success,
    };
  }

  private async stage(ticker: string, timestamp: string, result: GatherResult, dryRun: boolean): Promise<StoreResult> {
    const { source } = result;
    if (!result.success) {
      return { source, success: false, key: '', message: `Skipped: ${source} gather failed` };
    }
    if (!result.markdown) {
      return { source, success: false, key: '', message: `Skipped: ${source} returned no content` };
    }

    if (dryRun) {
      const key = storageKey(ticker, source, timestamp);
      return { source, success: true, key, message: `[DRY RUN] Would upload to ${key}` };
    }

    try {
      const outcome = await this.storage.store({ content: result.markdown, ticker, source, timestamp });
      return { source, ...outcome };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn({ ticker, source, err: message }, 'store failed');
      return { source, success: false, key: '', message: `Upload failed: ${message}` };
    }
  }

  private async triggerReindex(storeResults: readonly StoreResult[], dryRun: boolean): Promise<ReindexResult> {
    if (!storeResults.some(r => r.success)) {
      return { success: false, message: 'No data stored — skipping reindex' };
    }
    if (dryRun) {
      return { success: true, message: '[DRY RUN] Would trigger reindex' };
    }

    try {
      return await this.reindexSink.trigger();
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn({ err: message }, 'reindex failed');
      return { success: false, message: `Reindex failed: ${message}` };
    }
  }
}
