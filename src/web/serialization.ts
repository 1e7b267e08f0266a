/**
 * Shared serialization helpers for the web API layer.
 * Converts results to JSON-safe objects and maps error classes to HTTP status codes.
 */

import {
  ConfigError,
  DataParseError,
  NotFoundError,
  ProviderApiError,
  RateLimitError,
  UnknownAgentError,
  UnknownMetricError,
  UnknownSourceError,
  errorMessage,
} from '../core/errors.js';
import type { OrchestrationSummary } from '../gather/orchestrator.js';
import type { FundamentalsOutput } from '../gather/registry.js';

// ── Error Mapping ─────────────────────────────────────────────────────

export interface ApiError {
  status: number;
  body: { error: { type: string; message: string } };
}

function apiError(status: number, type: string, message: string): ApiError {
  return { status, body: { error: { type, message } } };
}

export function toApiError(err: unknown): ApiError {
  const message = errorMessage(err);
  if (err instanceof UnknownAgentError) return apiError(400, 'agent_not_found', message);
  if (err instanceof UnknownSourceError) return apiError(400, 'source_not_found', message);
  if (err instanceof UnknownMetricError) return apiError(400, 'metric_not_found', message);
  if (err instanceof NotFoundError) return apiError(404, 'not_found', message);
  if (err instanceof RateLimitError) return apiError(429, 'rate_limited', message);
  if (err instanceof ProviderApiError || err instanceof DataParseError) return apiError(502, 'api_error', message);
  if (err instanceof ConfigError) return apiError(500, 'config', message);
  return apiError(500, 'internal', 'Internal server error');
}

// ── Result Serializers ────────────────────────────────────────────────

export function serializeFundamentals(output: FundamentalsOutput, includeMarkdown: boolean) {
  return {
    ticker: output.ticker,
    company: output.company,
    timestamp: output.timestamp,
    cik: output.cik,
    metric_count: output.metric_count,
    financials: output.financials,
    derivations: output.derivations,
    supplementary: output.supplementary,
    ...(includeMarkdown ? { markdown: output.markdown } : {}),
  };
}

export function serializeSummary(summary: OrchestrationSummary) {
  return {
    ...summary,
    gather_results: summary.gather_results.map(gr => ({
      source: gr.source,
      success: gr.success,
      metric_count: gr.metric_count,
      error: gr.error ?? null,
    })),
  };
}
