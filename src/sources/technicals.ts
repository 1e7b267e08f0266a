import { z } from 'zod';
import { errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type { FinnhubClient } from '../core/finnhub-client.js';
import { toNumber } from '../processing/supplementary.js';
import { formatSignedPct } from '../output/format-utils.js';
import { renderSourceHeader, renderTechnicalsMarkdown } from '../output/research-renderer.js';
import type { GatherRequest, SignalBias, SourceHandler, TechnicalSignal, TechnicalsOutput } from '../gather/registry.js';

export type MarketApi = Pick<FinnhubClient, 'quote' | 'metrics'>;

export interface TechnicalsDeps {
  market: MarketApi | null;
  clock?: () => Date;
  logger?: Logger;
}

const num = z.unknown().transform(toNumber);

const quoteSchema = z.object({
  c: num,
  dp: num,
});

const priceMetricsSchema = z.object({
  metric: z.object({
    '52WeekHigh': num,
    '52WeekLow': num,
    '13WeekPriceReturnDaily': num,
    '26WeekPriceReturnDaily': num,
    '52WeekPriceReturnDaily': num,
    '10DayAverageTradingVolume': num,
    '3MonthAverageTradingVolume': num,
    beta: num,
  }),
});

export interface PriceSnapshot {
  price: number;
  change_pct: number | null;
  week_52_high: number | null;
  week_52_low: number | null;
  return_13w: number | null;
  return_26w: number | null;
  return_52w: number | null;
  volume_10d: number | null;
  volume_3m: number | null;
  beta: number | null;
}

/** Null when the quote carries no price (Finnhub answers 0 for unknown symbols) */
export function parsePriceSnapshot(rawQuote: unknown, rawMetrics: unknown): PriceSnapshot | null {
  const quote = quoteSchema.safeParse(rawQuote);
  if (!quote.success || quote.data.c === null || quote.data.c <= 0) return null;

  const metrics = priceMetricsSchema.safeParse(rawMetrics);
  const m = metrics.success ? metrics.data.metric : null;

  return {
    price: quote.data.c,
    change_pct: quote.data.dp,
    week_52_high: m?.['52WeekHigh'] ?? null,
    week_52_low: m?.['52WeekLow'] ?? null,
    return_13w: m?.['13WeekPriceReturnDaily'] ?? null,
    return_26w: m?.['26WeekPriceReturnDaily'] ?? null,
    return_52w: m?.['52WeekPriceReturnDaily'] ?? null,
    volume_10d: m?.['10DayAverageTradingVolume'] ?? null,
    volume_3m: m?.['3MonthAverageTradingVolume'] ?? null,
    beta: m?.beta ?? null,
  };
}

function bySign(value: number): SignalBias {
  return value > 0 ? 'bullish' : value < 0 ? 'bearish' : 'neutral';
}

/** Rule-based signals; each is emitted only when its inputs are present */
export function deriveTechnicalSignals(snap: PriceSnapshot): TechnicalSignal[] {
  const signals: TechnicalSignal[] = [];

  if (snap.change_pct !== null) {
    signals.push({ name: 'Daily Move', value: formatSignedPct(snap.change_pct), bias: bySign(snap.change_pct) });
  }

  const { week_52_high: high, week_52_low: low } = snap;
  if (high !== null && low !== null && high > low) {
    const position = ((snap.price - low) / (high - low)) * 100;
    const bias: SignalBias = position >= 80 ? 'bullish' : position <= 20 ? 'bearish' : 'neutral';
    signals.push({
      name: '52-Week Position',
      value: `${position.toFixed(0)}% of range ($${low.toFixed(2)} - $${high.toFixed(2)})`,
      bias,
    });
  }

  for (const [name, value] of [
    ['13-Week Return', snap.return_13w],
    ['26-Week Return', snap.return_26w],
    ['52-Week Return', snap.return_52w],
  ] as const) {
    if (value !== null) signals.push({ name, value: formatSignedPct(value), bias: bySign(value) });
  }

  if (snap.volume_10d !== null && snap.volume_3m !== null && snap.volume_3m > 0) {
    const ratio = snap.volume_10d / snap.volume_3m;
    const label = ratio >= 1.2 ? 'elevated' : ratio <= 0.8 ? 'subdued' : 'normal';
    signals.push({ name: 'Volume Trend', value: `${ratio.toFixed(2)}x 3-month average (${label})`, bias: 'neutral' });
  }

  if (snap.beta !== null) {
    const label = snap.beta >= 1.2 ? 'high' : snap.beta <= 0.8 ? 'low' : 'market-like';
    signals.push({ name: 'Beta', value: `${snap.beta.toFixed(2)} (${label} volatility)`, bias: 'neutral' });
  }

  return signals;
}

export async function gatherTechnicals(request: GatherRequest, deps: TechnicalsDeps): Promise<TechnicalsOutput> {
  if (!deps.market) {
    throw new Error('Technical signals need FINNHUB_API_KEY');
  }
  const logger = (deps.logger ?? silentLogger).child({ source: 'technicals' });
  const { ticker } = request;

  const rawQuote = await deps.market.quote(ticker);
  let rawMetrics: unknown = null;
  try {
    rawMetrics = await deps.market.metrics(ticker);
  } catch (err) {
    logger.warn({ ticker, err: errorMessage(err) }, 'price metrics unavailable');
  }

  const snap = parsePriceSnapshot(rawQuote, rawMetrics);
  if (!snap) {
    throw new Error(`No quote data for ${ticker}`);
  }
  const signals = deriveTechnicalSignals(snap);

  const timestamp = (deps.clock ?? (() => new Date()))().toISOString();
  return {
    source: 'technicals',
    ticker,
    company: request.companyName,
    timestamp,
    markdown:
      renderSourceHeader('Technical Research', request, timestamp) +
      renderTechnicalsMarkdown(snap.price, snap.change_pct, signals),
    signal_count: signals.length,
    signals,
  };
}

export function createTechnicalsSource(deps: TechnicalsDeps): SourceHandler<'technicals'> {
  return request => gatherTechnicals(request, deps);
}
