import { HttpClient, type HttpClientOptions } from './http-client.js';

/**
 * Finnhub REST client. Returns raw payloads; shape checks and numeric
 * conversion happen in the processing layer that consumes each endpoint.
 */

export type FinnhubClientOptions = Omit<HttpClientOptions, 'provider' | 'headers' | 'redact' | 'forbiddenHint'> & {
  apiKey: string;
  baseUrl?: string;
};

export class FinnhubClient {
  private readonly http: HttpClient;
  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(options: FinnhubClientOptions) {
    const { apiKey, baseUrl, ...rest } = options;
    if (!apiKey.trim()) {
      throw new Error('FINNHUB_API_KEY is required to create a Finnhub client.');
    }
    this.apiKey = apiKey;
    this.baseUrl = baseUrl ?? 'https://finnhub.io';
    this.http = new HttpClient({
      ...rest,
      provider: 'finnhub',
      requestsPerSecond: rest.requestsPerSecond ?? 30,
      forbiddenHint: 'The endpoint may need a paid Finnhub plan.',
      redact: url => url.replace(/([?&]token=)[^&]*/, '$1***'),
    });
  }

  private get(path: string, params: Record<string, string>, ttlHours: number): Promise<unknown> {
    const url = new URL(`/api/v1${path}`, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('token', this.apiKey);
    return this.http.getJson(url.toString(), ttlHours);
  }

  profile(symbol: string): Promise<unknown> {
    return this.get('/stock/profile2', { symbol }, 24);
  }

  metrics(symbol: string): Promise<unknown> {
    return this.get('/stock/metric', { symbol, metric: 'all' }, 6);
  }

  upgradesDowngrades(symbol: string): Promise<unknown> {
    return this.get('/stock/upgrade-downgrade', { symbol }, 6);
  }

  earnings(symbol: string): Promise<unknown> {
    return this.get('/stock/earnings', { symbol }, 24);
  }

  quote(symbol: string): Promise<unknown> {
    return this.get('/quote', { symbol }, 0.25);
  }

  companyNews(symbol: string, from: string, to: string): Promise<unknown> {
    return this.get('/company-news', { symbol, from, to }, 1);
  }

  socialSentiment(symbol: string, from: string, to: string): Promise<unknown> {
    return this.get('/stock/social-sentiment', { symbol, from, to }, 1);
  }
}
