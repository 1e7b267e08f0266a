import { z } from 'zod';
import { METRIC_DEFINITIONS, type MetricDefinition } from './metric-definitions.js';
import {
  FILING_TYPES,
  METRIC_CATEGORIES,
  UNIT_PRIORITY,
  type BaseFilingType,
  type CompanyFacts,
  type FilingType,
  type MetricsDocument,
  type Observation,
  type UnitKind,
} from '../core/types.js';

/**
 * XBRL Processor: resolves vendor concepts, then cleans, windows and
 * deduplicates their facts into Observation series.
 *
 * Concept selection: "first alias with data wins"
 * - Aliases are tried in taxonomy order, units in UNIT_PRIORITY order
 * - No merging across aliases
 *
 * Deduplication: "last seen wins" per (period end, form without /A)
 * - The same period appears in several filings (comparatives, amendments)
 * - Sorting is stable, so a later entry for the same period replaces the
 *   earlier one in place and amendments never duplicate their original
 */

const TAXONOMY = 'us-gaap';
const DEFAULT_YEARS = 5;

export interface ResolvedConcept {
  alias: string;
  unit: UnitKind;
  facts: readonly unknown[];
}

export interface ExtractOptions {
  /** Lookback window in years */
  years?: number;
  /** Reference date for the lookback window */
  now?: Date;
}

/**
 * Every alias/unit pair that has reported values, in priority order.
 * Aliases whose data sits only in units outside UNIT_PRIORITY never appear.
 */
export function* conceptCandidates(
  payload: CompanyFacts | null | undefined,
  aliases: readonly string[]
): Generator<ResolvedConcept> {
  const concepts = payload?.facts?.[TAXONOMY];
  if (!concepts) return;

  for (const alias of aliases) {
    const units = concepts[alias]?.units;
    if (!units) continue;

    for (const unit of UNIT_PRIORITY) {
      const facts = units[unit];
      if (Array.isArray(facts) && facts.length > 0) {
        yield { alias, unit, facts };
      }
    }
  }
}

/** Raw facts of the first alias that has data under a preferred unit */
export function resolveConcept(
  payload: CompanyFacts | null | undefined,
  aliases: readonly string[]
): ResolvedConcept | undefined {
  for (const candidate of conceptCandidates(payload, aliases)) {
    return candidate;
  }
  return undefined;
}

const rawFactSchema = z.object({
  val: z.number().nullable().optional(),
  end: z.string().optional(),
  form: z.string().optional(),
  filed: z.string().optional(),
  fy: z.number().nullable().optional(),
  fp: z.string().nullable().optional(),
});

function isFilingType(form: string): form is FilingType {
  return FILING_TYPES.some(t => t === form);
}

export function baseFilingType(form: FilingType): BaseFilingType {
  return form.startsWith('10-K') ? '10-K' : '10-Q';
}

/** YYYY-MM-DD that names a real calendar day */
function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Clean a raw fact collection into an ascending, deduplicated series.
 * Malformed records are dropped one by one; never throws.
 */
export function extractObservations(facts: readonly unknown[], options: ExtractOptions = {}): Observation[] {
  const years = options.years ?? DEFAULT_YEARS;
  const cutoffYear = (options.now ?? new Date()).getFullYear() - years;

  const kept: Observation[] = [];
  for (const raw of facts) {
    const parsed = rawFactSchema.safeParse(raw);
    if (!parsed.success) continue;

    const fact = parsed.data;
    const form = fact.form ?? '';
    if (!isFilingType(form)) continue;

    const end = fact.end ?? '';
    if (!isIsoDate(end)) continue;
    if (Number(end.slice(0, 4)) < cutoffYear) continue;

    kept.push({
      value: fact.val ?? null,
      period_end: end,
      filing_type: form,
      filed_date: fact.filed ?? '',
      fiscal_year: fact.fy ?? null,
      fiscal_period: fact.fp ?? '',
    });
  }

  // Ties on period end go by filing date, so the last one kept is the latest filed
  kept.sort((a, b) => a.period_end.localeCompare(b.period_end) || a.filed_date.localeCompare(b.filed_date));

  const byPeriod = new Map<string, Observation>();
  for (const obs of kept) {
    byPeriod.set(`${obs.period_end}|${baseFilingType(obs.filing_type)}`, obs);
  }

  return Array.from(byPeriod.values());
}

export interface MetricExtraction {
  observations: Observation[];
  concept: ResolvedConcept | null;
}

/**
 * Resolve and extract one metric. A candidate whose facts all fall outside
 * the window yields to the next candidate.
 */
export function extractMetric(
  payload: CompanyFacts | null | undefined,
  aliases: readonly string[],
  options: ExtractOptions = {}
): MetricExtraction {
  for (const candidate of conceptCandidates(payload, aliases)) {
    const observations = extractObservations(candidate.facts, options);
    if (observations.length > 0) {
      return { observations, concept: candidate };
    }
  }
  return { observations: [], concept: null };
}

export function emptyMetricsDocument(): MetricsDocument {
  return { income: {}, balance_sheet: {}, cash_flow: {} };
}

/**
 * Build the normalized metrics document. Pure: no I/O, no shared state.
 * Metrics without observations are omitted.
 */
export function extractFinancials(
  payload: CompanyFacts | null | undefined,
  options: ExtractOptions = {},
  definitions: readonly MetricDefinition[] = METRIC_DEFINITIONS
): MetricsDocument {
  const doc = emptyMetricsDocument();
  if (!payload) return doc;

  for (const metric of definitions) {
    const { observations } = extractMetric(payload, metric.aliases, options);
    if (observations.length > 0) {
      doc[metric.category][metric.id] = observations;
    }
  }

  return doc;
}

export function countMetrics(doc: MetricsDocument): number {
  return METRIC_CATEGORIES.reduce((sum, category) => sum + Object.keys(doc[category]).length, 0);
}

export function isEmptyDocument(doc: MetricsDocument): boolean {
  return countMetrics(doc) === 0;
}
