import { describe, it, expect, vi } from 'vitest';
import {
  FinnhubSupplementaryProvider,
  parseAnalystActions,
  parseEarnings,
  parseProfile,
  toIsoDate,
  withRegistrantInfo,
  toNumber,
  type FinnhubApi,
} from '../src/processing/supplementary.js';
import { EMPTY_SNAPSHOT } from '../src/core/types.js';

const PROFILE = {
  name: 'Sample Dining Co',
  ticker: 'CAKE',
  finnhubIndustry: 'Hotels, Restaurants & Leisure',
  marketCapitalization: 2600,
};

const METRICS = {
  metric: {
    peTTM: '14.26',
    forwardPE: null,
    pb: 5.12,
    beta: 1.1,
    '52WeekHigh': 58.5,
    '52WeekLow': 33.25,
    currentDividendYieldTTM: 2.5,
    enterpriseValue: 3100.5,
    someOtherField: 'kept out',
  },
};

describe('ingestion conversions', () => {
  it('toNumber accepts numbers and numeric strings only', () => {
    expect(toNumber(4.22)).toBe(4.22);
    expect(toNumber(' 14.5 ')).toBe(14.5);
    expect(toNumber('')).toBeNull();
    expect(toNumber('n/a')).toBeNull();
    expect(toNumber(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toNumber(null)).toBeNull();
    expect(toNumber(true)).toBeNull();
  });

  it('toIsoDate reads unix seconds, epoch milliseconds and date strings', () => {
    expect(toIsoDate(1717200000)).toBe('2024-06-01');
    expect(toIsoDate(1717200000000)).toBe('2024-06-01');
    expect(toIsoDate('2025-03-31')).toBe('2025-03-31');
    expect(toIsoDate('someday')).toBeNull();
    expect(toIsoDate(undefined)).toBeNull();
  });
});

describe('parseProfile', () => {
  it('merges profile and metrics with unit conversions', () => {
    expect(parseProfile('CAKE', PROFILE, METRICS)).toEqual({
      name: 'Sample Dining Co',
      long_name: 'Sample Dining Co',
      sector: 'Hotels, Restaurants & Leisure',
      industry: null,
      market_cap: 2_600_000_000,
      enterprise_value: 3_100_500_000,
      trailing_pe: 14.26,
      forward_pe: null,
      price_to_book: 5.12,
      dividend_yield: 0.025,
      beta: 1.1,
      week_52_high: 58.5,
      week_52_low: 33.25,
      description: null,
    });
  });

  it('falls back to the ticker when only metrics are available', () => {
    const profile = parseProfile('CAKE', null, METRICS);
    expect(profile?.name).toBe('CAKE');
    expect(profile?.long_name).toBeNull();
    expect(profile?.market_cap).toBeNull();
  });

  it('returns null when neither section has data', () => {
    expect(parseProfile('CAKE', null, null)).toBeNull();
    expect(parseProfile('CAKE', {}, { error: 'no access' })).toBeNull();
  });

  it('returns null for a symbol Finnhub answers with empty objects', () => {
    expect(parseProfile('ZZZZ', {}, { metric: {} })).toBeNull();
  });
});

describe('withRegistrantInfo', () => {
  const INFO = { name: 'Sample Dining Co', industry: 'Retail-Eating Places', description: 'Operates restaurants.' };

  it('fills industry and description without overwriting market data', () => {
    const merged = withRegistrantInfo(parseProfile('CAKE', PROFILE, METRICS), INFO, 'CAKE');
    expect(merged?.sector).toBe('Hotels, Restaurants & Leisure');
    expect(merged?.industry).toBe('Retail-Eating Places');
    expect(merged?.description).toBe('Operates restaurants.');
    expect(merged?.market_cap).toBe(2_600_000_000);
  });

  it('builds a profile from the registrant record alone', () => {
    const profile = withRegistrantInfo(null, INFO, 'CAKE');
    expect(profile?.name).toBe('Sample Dining Co');
    expect(profile?.industry).toBe('Retail-Eating Places');
    expect(profile?.market_cap).toBeNull();
  });

  it('adds nothing when the record has no classification', () => {
    expect(withRegistrantInfo(null, { name: 'Sample Dining Co', industry: null, description: null }, 'CAKE')).toBeNull();
    expect(withRegistrantInfo(null, null, 'CAKE')).toBeNull();
  });
});

describe('parseAnalystActions', () => {
  it('drops incomplete entries and sorts oldest first', () => {
    const actions = parseAnalystActions([
      { company: 'Firm B', toGrade: 'Hold', fromGrade: 'Buy', action: 'down', gradeTime: 1717286400 },
      { company: 'Firm A', toGrade: 'Buy', fromGrade: '', action: 'init', gradeTime: 1704067200 },
      { company: '', toGrade: 'Sell', gradeTime: 1717200000 },
    ]);
    expect(actions).toEqual([
      { firm: 'Firm A', to_grade: 'Buy', from_grade: null, action: 'init', date: '2024-01-01' },
      { firm: 'Firm B', to_grade: 'Hold', from_grade: 'Buy', action: 'down', date: '2024-06-02' },
    ]);
  });

  it('keeps only the most recent ten', () => {
    const raw = Array.from({ length: 14 }, (_, i) => ({
      company: `Firm ${i}`,
      toGrade: 'Buy',
      gradeTime: 1704067200 + i * 86400,
    }));
    const actions = parseAnalystActions(raw);
    expect(actions).toHaveLength(10);
    expect(actions[0].firm).toBe('Firm 4');
    expect(actions[9].firm).toBe('Firm 13');
  });

  it('returns an empty list for unexpected shapes', () => {
    expect(parseAnalystActions({ error: 'premium' })).toEqual([]);
    expect(parseAnalystActions(null)).toEqual([]);
  });
});

describe('parseEarnings', () => {
  it('converts records and keeps the latest twelve quarters', () => {
    const raw = Array.from({ length: 14 }, (_, i) => {
      const year = 2022 + Math.floor(i / 4);
      const month = String((i % 4) * 3 + 3).padStart(2, '0');
      return { period: `${year}-${month}-28`, estimate: 1, actual: '1.1', surprisePercent: 10 };
    }).reverse();
    const records = parseEarnings(raw);
    expect(records).toHaveLength(12);
    expect(records[0]).toEqual({ quarter_end: '2022-09-28', eps_estimate: 1, eps_actual: 1.1, surprise_pct: 10 });
    expect(records[11].quarter_end).toBe('2025-06-28');
  });

  it('skips records without a period', () => {
    expect(parseEarnings([{ period: null, estimate: 1, actual: 1, surprisePercent: 0 }])).toEqual([]);
  });
});

describe('FinnhubSupplementaryProvider', () => {
  function api(overrides: Partial<FinnhubApi> = {}): FinnhubApi {
    return {
      profile: vi.fn(async () => PROFILE),
      metrics: vi.fn(async () => METRICS),
      upgradesDowngrades: vi.fn(async () => [{ company: 'Firm A', toGrade: 'Buy', gradeTime: 1704067200 }]),
      earnings: vi.fn(async () => [{ period: '2025-03-31', estimate: 0.95, actual: 1.02, surprisePercent: 7.37 }]),
      ...overrides,
    };
  }

  it('assembles every section', async () => {
    const snapshot = await new FinnhubSupplementaryProvider(api()).fetchSnapshot('CAKE');
    expect(snapshot.profile?.market_cap).toBe(2_600_000_000);
    expect(snapshot.profile?.sector).toBe('Hotels, Restaurants & Leisure');
    expect(snapshot.profile?.long_name).toBe('Sample Dining Co');
    expect(snapshot.analyst_actions).toHaveLength(1);
    expect(snapshot.earnings_history).toEqual([
      { quarter_end: '2025-03-31', eps_estimate: 0.95, eps_actual: 1.02, surprise_pct: 7.37 },
    ]);
  });

  it('isolates a failing section', async () => {
    const provider = new FinnhubSupplementaryProvider(
      api({
        upgradesDowngrades: async () => {
          throw new Error('403 premium endpoint');
        },
      })
    );
    const snapshot = await provider.fetchSnapshot('CAKE');
    expect(snapshot.analyst_actions).toEqual([]);
    expect(snapshot.profile?.name).toBe('Sample Dining Co');
    expect(snapshot.earnings_history).toHaveLength(1);
  });

  it('returns an empty snapshot without a client', async () => {
    expect(await new FinnhubSupplementaryProvider(null).fetchSnapshot('CAKE')).toEqual(EMPTY_SNAPSHOT);
  });
});
