import { describe, it, expect } from 'vitest';
import {
  ProviderApiError,
  NotFoundError,
  RateLimitError,
  DataParseError,
  UnknownAgentError,
  UnknownSourceError,
  UnknownMetricError,
  ConfigError,
  errorMessage,
} from '../src/core/errors.js';

describe('Custom Error Types', () => {
  it('ProviderApiError has statusCode, url and provider', () => {
    const err = new ProviderApiError('test', 500, 'https://example.com', 'finnhub');
    expect(err.statusCode).toBe(500);
    expect(err.url).toBe('https://example.com');
    expect(err.provider).toBe('finnhub');
    expect(err.name).toBe('ProviderApiError');
    expect(err instanceof Error).toBe(true);
  });

  it('NotFoundError is a 404 ProviderApiError', () => {
    const err = new NotFoundError('https://example.com');
    expect(err.statusCode).toBe(404);
    expect(err.provider).toBe('sec');
    expect(err.message).toBe('Not found: https://example.com');
    expect(err instanceof ProviderApiError).toBe(true);
  });

  it('RateLimitError is a 429 ProviderApiError', () => {
    const err = new RateLimitError('https://example.com', 'finnhub');
    expect(err.statusCode).toBe(429);
    expect(err.message).toBe('finnhub API rate limit exceeded. Wait a moment and retry.');
    expect(err instanceof ProviderApiError).toBe(true);
  });

  it('DataParseError has source', () => {
    const err = new DataParseError('bad json', 'https://example.com');
    expect(err.source).toBe('https://example.com');
    expect(err.name).toBe('DataParseError');
  });

  it('UnknownAgentError lists the valid agents', () => {
    const err = new UnknownAgentError('zeus', ['nova', 'luna']);
    expect(err.message).toBe('Unknown agent: "zeus". Valid agents: nova, luna');
    expect(err.agent).toBe('zeus');
  });

  it('UnknownSourceError lists the valid sources', () => {
    const err = new UnknownSourceError(['tarot'], ['web', 'social']);
    expect(err.message).toBe('Unknown sources: tarot. Valid sources: web, social');
    expect(err.sources).toEqual(['tarot']);
  });

  it('UnknownMetricError has available metrics', () => {
    const err = new UnknownMetricError('employees', ['revenue', 'net_income']);
    expect(err.availableMetrics).toEqual(['revenue', 'net_income']);
    expect(err.message).toBe('Unknown metric: "employees"');
  });

  it('ConfigError joins its issues', () => {
    const err = new ConfigError(['PORT: Expected number', 'LOG_LEVEL: Invalid enum value']);
    expect(err.message).toBe('Invalid configuration: PORT: Expected number; LOG_LEVEL: Invalid enum value');
  });

  it('errorMessage reads errors and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
