import { z } from 'zod';
import { errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type { FinnhubClient } from '../core/finnhub-client.js';
import {
  EMPTY_SNAPSHOT,
  type AnalystAction,
  type CompanyProfile,
  type CompanySnapshot,
  type EarningsSurprise,
  type RegistrantInfo,
} from '../core/types.js';

/**
 * Supplementary market data: company profile, valuation multiples, analyst
 * actions and earnings surprises.
 *
 * Vendor values arrive as numbers, numeric strings, nulls or unix
 * timestamps. They are converted here, once, into number | null and ISO
 * dates; renderers never see the raw shapes.
 */

export const MAX_ANALYST_ACTIONS = 10;
export const MAX_EARNINGS_RECORDS = 12;

export interface SupplementaryProvider {
  fetchSnapshot(ticker: string): Promise<CompanySnapshot>;
}

export type FinnhubApi = Pick<FinnhubClient, 'profile' | 'metrics' | 'upgradesDowngrades' | 'earnings'>;

// ── Ingestion-boundary conversions ────────────────────────────────────

export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Unix seconds, epoch milliseconds or a date string → YYYY-MM-DD */
export function toIsoDate(value: unknown): string | null {
  let date: Date | null = null;
  if (typeof value === 'number' && Number.isFinite(value)) {
    date = new Date(value < 1e11 ? value * 1000 : value);
  } else if (typeof value === 'string' && value.trim() !== '') {
    date = new Date(value);
  } else if (value instanceof Date) {
    date = value;
  }
  if (!date || Number.isNaN(date.getTime())) return null;
  return date.toISOString().slice(0, 10);
}

function toText(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

const numeric = z.unknown().transform(toNumber);
const isoDate = z.unknown().transform(toIsoDate);
const text = z.unknown().transform(toText);

const profileSchema = z.object({
  name: text,
  ticker: text,
  finnhubIndustry: text,
  // Finnhub reports capitalization in millions
  marketCapitalization: numeric,
});

const metricSchema = z.object({
  metric: z
    .object({
      peTTM: numeric,
      forwardPE: numeric,
      pb: numeric,
      beta: numeric,
      '52WeekHigh': numeric,
      '52WeekLow': numeric,
      currentDividendYieldTTM: numeric,
      enterpriseValue: numeric,
    })
    .passthrough(),
});

const upgradeSchema = z.array(
  z.object({
    company: text,
    toGrade: text,
    fromGrade: text,
    action: text,
    gradeTime: isoDate,
  })
);

const earningsSchema = z.array(
  z.object({
    period: isoDate,
    estimate: numeric,
    actual: numeric,
    surprisePercent: numeric,
  })
);

function millions(value: number | null): number | null {
  return value === null ? null : value * 1e6;
}

/**
 * Finnhub's `finnhubIndustry` is a sector-level classification, so it fills
 * `sector`; the finer industry and the description come from the SEC
 * registrant record (see withRegistrantInfo). Null when Finnhub knows
 * nothing about the symbol, which it signals with empty objects.
 */
export function parseProfile(ticker: string, rawProfile: unknown, rawMetrics: unknown): CompanyProfile | null {
  const profile = profileSchema.safeParse(rawProfile ?? {});
  const metrics = metricSchema.safeParse(rawMetrics ?? {});
  const p = profile.success ? profile.data : null;
  const m = metrics.success ? metrics.data.metric : null;

  const dividendPct = m?.currentDividendYieldTTM ?? null;
  const facts = {
    sector: p?.finnhubIndustry ?? null,
    market_cap: millions(p?.marketCapitalization ?? null),
    enterprise_value: millions(m?.enterpriseValue ?? null),
    trailing_pe: m?.peTTM ?? null,
    forward_pe: m?.forwardPE ?? null,
    price_to_book: m?.pb ?? null,
    // Stored as a fraction, like the other ratios
    dividend_yield: dividendPct === null ? null : dividendPct / 100,
    beta: m?.beta ?? null,
    week_52_high: m?.['52WeekHigh'] ?? null,
    week_52_low: m?.['52WeekLow'] ?? null,
  };
  const name = p?.name ?? null;
  if (name === null && Object.values(facts).every(v => v === null)) return null;

  return {
    name: name ?? ticker,
    long_name: name,
    industry: null,
    description: null,
    ...facts,
  };
}

/**
 * Fill the profile's gaps from the SEC registrant record. Creates a profile
 * when market data had none but the registrant record has something to show.
 */
export function withRegistrantInfo(
  profile: CompanyProfile | null,
  info: RegistrantInfo | null,
  ticker: string
): CompanyProfile | null {
  if (!info) return profile;
  if (profile) {
    return {
      ...profile,
      long_name: profile.long_name ?? info.name,
      industry: profile.industry ?? info.industry,
      description: profile.description ?? info.description,
    };
  }
  if (info.industry === null && info.description === null) return null;
  return {
    name: info.name ?? ticker,
    long_name: info.name,
    sector: null,
    industry: info.industry,
    market_cap: null,
    enterprise_value: null,
    trailing_pe: null,
    forward_pe: null,
    price_to_book: null,
    dividend_yield: null,
    beta: null,
    week_52_high: null,
    week_52_low: null,
    description: info.description,
  };
}

/** Oldest first, bounded to the most recent MAX_ANALYST_ACTIONS */
export function parseAnalystActions(raw: unknown): AnalystAction[] {
  const parsed = upgradeSchema.safeParse(raw);
  if (!parsed.success) return [];

  const actions: AnalystAction[] = [];
  for (const entry of parsed.data) {
    if (!entry.company || !entry.toGrade) continue;
    actions.push({
      firm: entry.company,
      to_grade: entry.toGrade,
      from_grade: entry.fromGrade,
      action: entry.action,
      date: entry.gradeTime,
    });
  }

  actions.sort((a, b) => (a.date ?? '').localeCompare(b.date ?? ''));
  return actions.slice(-MAX_ANALYST_ACTIONS);
}

/** Oldest first, bounded to the most recent MAX_EARNINGS_RECORDS */
export function parseEarnings(raw: unknown): EarningsSurprise[] {
  const parsed = earningsSchema.safeParse(raw);
  if (!parsed.success) return [];

  const records: EarningsSurprise[] = [];
  for (const entry of parsed.data) {
    if (!entry.period) continue;
    records.push({
      quarter_end: entry.period,
      eps_estimate: entry.estimate,
      eps_actual: entry.actual,
      surprise_pct: entry.surprisePercent,
    });
  }

  records.sort((a, b) => a.quarter_end.localeCompare(b.quarter_end));
  return records.slice(-MAX_EARNINGS_RECORDS);
}

/**
 * Snapshot from Finnhub. Each section is fetched and parsed on its own;
 * a failure leaves that section empty and is logged as a warning.
 * Without a client (no API key) every snapshot is empty.
 */
export class FinnhubSupplementaryProvider implements SupplementaryProvider {
  private readonly logger: Logger;

  constructor(
    private readonly api: FinnhubApi | null,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child({ component: 'supplementary' });
  }

  async fetchSnapshot(ticker: string): Promise<CompanySnapshot> {
    if (!this.api) {
      this.logger.debug({ ticker }, 'no Finnhub API key; supplementary data skipped');
      return EMPTY_SNAPSHOT;
    }
    const api = this.api;

    const rawProfile = await this.section(ticker, 'profile', () => api.profile(ticker));
    const rawMetrics = await this.section(ticker, 'metrics', () => api.metrics(ticker));
    const rawActions = await this.section(ticker, 'analyst actions', () => api.upgradesDowngrades(ticker));
    const rawEarnings = await this.section(ticker, 'earnings', () => api.earnings(ticker));

    return {
      profile: parseProfile(ticker, rawProfile, rawMetrics),
      analyst_actions: parseAnalystActions(rawActions),
      earnings_history: parseEarnings(rawEarnings),
    };
  }

  private async section(ticker: string, name: string, fetchSection: () => Promise<unknown>): Promise<unknown> {
    try {
      return await fetchSection();
    } catch (err) {
      this.logger.warn({ ticker, section: name, err: errorMessage(err) }, 'supplementary section unavailable');
      return null;
    }
  }
}
