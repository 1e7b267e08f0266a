import type { CompanySnapshot, Derivations, MetricsDocument } from '../core/types.js';

/**
 * Source registry: a static mapping from source tag to handler.
 *
 * Each handler returns its own variant of GatherOutput; metricCount() is
 * the single place that knows which count field each variant carries.
 */

export const SOURCE_TAGS = ['web', 'fundamentals', 'social', 'technicals'] as const;
export type SourceTag = (typeof SOURCE_TAGS)[number];

export function isSourceTag(value: string): value is SourceTag {
  return SOURCE_TAGS.some(tag => tag === value);
}

/** Uniform call shape for every source */
export interface GatherRequest {
  ticker: string;
  companyName: string;
  theme?: string;
  directive?: string;
}

interface OutputBase {
  ticker: string;
  company: string;
  timestamp: string;
  markdown: string;
}

export interface WebOutput extends OutputBase {
  source: 'web';
  article_count: number;
  filing_count: number;
}

export interface FundamentalsOutput extends OutputBase {
  source: 'fundamentals';
  cik: string | null;
  metric_count: number;
  financials: MetricsDocument;
  derivations: Derivations;
  supplementary: CompanySnapshot;
  theme: string | null;
  directive: string | null;
}

export interface SocialOutput extends OutputBase {
  source: 'social';
  post_count: number;
}

export type SignalBias = 'bullish' | 'bearish' | 'neutral';

export interface TechnicalSignal {
  name: string;
  value: string;
  bias: SignalBias;
}

export interface TechnicalsOutput extends OutputBase {
  source: 'technicals';
  signal_count: number;
  signals: TechnicalSignal[];
}

export type GatherOutput = WebOutput | FundamentalsOutput | SocialOutput | TechnicalsOutput;

export type OutputFor<T extends SourceTag> = Extract<GatherOutput, { source: T }>;

export type SourceHandler<T extends SourceTag = SourceTag> = (request: GatherRequest) => Promise<OutputFor<T>>;

export type SourceHandlers = { [T in SourceTag]?: SourceHandler<T> };

/** Canonical item count of one output */
export function metricCount(output: GatherOutput): number {
  switch (output.source) {
    case 'web':
      return output.article_count + output.filing_count;
    case 'fundamentals':
      return output.metric_count;
    case 'social':
      return output.post_count;
    case 'technicals':
      return output.signal_count;
  }
}

type AnyHandler = (request: GatherRequest) => Promise<GatherOutput>;

export class SourceRegistry {
  private readonly handlers = new Map<SourceTag, AnyHandler>();

  constructor(handlers: SourceHandlers) {
    for (const tag of SOURCE_TAGS) {
      const handler: AnyHandler | undefined = handlers[tag];
      if (handler) this.handlers.set(tag, handler);
    }
  }

  has(source: string): source is SourceTag {
    return isSourceTag(source) && this.handlers.has(source);
  }

  /** Registered tags in canonical order */
  tags(): SourceTag[] {
    return SOURCE_TAGS.filter(tag => this.handlers.has(tag));
  }

  run(tag: SourceTag, request: GatherRequest): Promise<GatherOutput> {
    const handler = this.handlers.get(tag);
    if (!handler) {
      return Promise.reject(new Error(`Unknown source: ${tag}`));
    }
    return handler(request);
  }
}
