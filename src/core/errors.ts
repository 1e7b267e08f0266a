/**
 * Custom error types for upstream providers and request validation.
 * Enables callers to handle different failure modes appropriately.
 */

export class ProviderApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string,
    public readonly provider: string = 'sec'
  ) {
    super(message);
    this.name = 'ProviderApiError';
  }
}

export class NotFoundError extends ProviderApiError {
  constructor(url: string, provider: string = 'sec', detail: string = '') {
    super(`Not found: ${detail || url}`, 404, url, provider);
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends ProviderApiError {
  constructor(url: string, provider: string = 'sec') {
    super(
      `${provider} API rate limit exceeded. Wait a moment and retry.`,
      429,
      url,
      provider
    );
    this.name = 'RateLimitError';
  }
}

export class DataParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'DataParseError';
  }
}

export class UnknownSourceError extends Error {
  constructor(
    public readonly sources: string[],
    public readonly validSources: string[]
  ) {
    super(`Unknown sources: ${sources.join(', ')}. Valid sources: ${validSources.join(', ')}`);
    this.name = 'UnknownSourceError';
  }
}

export class UnknownAgentError extends Error {
  constructor(
    public readonly agent: string,
    public readonly validAgents: string[]
  ) {
    super(`Unknown agent: "${agent}". Valid agents: ${validAgents.join(', ')}`);
    this.name = 'UnknownAgentError';
  }
}

export class UnknownMetricError extends Error {
  constructor(
    public readonly query: string,
    public readonly availableMetrics: string[]
  ) {
    super(`Unknown metric: "${query}"`);
    this.name = 'UnknownMetricError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
