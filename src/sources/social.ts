import { z } from 'zod';
import type { FinnhubClient } from '../core/finnhub-client.js';
import type { SocialPlatformSummary } from '../core/types.js';
import { toNumber } from '../processing/supplementary.js';
import { renderSocialMarkdown, renderSourceHeader } from '../output/research-renderer.js';
import type { GatherRequest, SocialOutput, SourceHandler } from '../gather/registry.js';

const WINDOW_DAYS = 7;

export type SentimentApi = Pick<FinnhubClient, 'socialSentiment'>;

export interface SocialDeps {
  sentiment: SentimentApi | null;
  clock?: () => Date;
}

const bucketSchema = z.object({
  mention: z.unknown().transform(toNumber),
  positiveMention: z.unknown().transform(toNumber),
  negativeMention: z.unknown().transform(toNumber),
  score: z.unknown().transform(toNumber),
});

const sentimentSchema = z.object({
  reddit: z.array(bucketSchema).optional(),
  twitter: z.array(bucketSchema).optional(),
  data: z.array(bucketSchema).optional(),
});

const PLATFORMS = [
  ['reddit', 'Reddit'],
  ['twitter', 'Twitter'],
  ['data', 'All platforms'],
] as const;

/** Sentiment buckets summed per platform; platforms without mentions are left out */
export function summarizeSentiment(raw: unknown): SocialPlatformSummary[] {
  const parsed = sentimentSchema.safeParse(raw);
  if (!parsed.success) return [];

  const summaries: SocialPlatformSummary[] = [];
  for (const [key, platform] of PLATFORMS) {
    // The combined feed repeats the per-platform counts
    if (key === 'data' && summaries.length > 0) continue;
    const buckets = parsed.data[key] ?? [];
    let mentions = 0;
    let positive = 0;
    let negative = 0;
    const scores: number[] = [];
    for (const b of buckets) {
      mentions += b.mention ?? 0;
      positive += b.positiveMention ?? 0;
      negative += b.negativeMention ?? 0;
      if (b.score !== null) scores.push(b.score);
    }
    if (mentions === 0) continue;
    summaries.push({
      platform,
      mentions,
      positive_mentions: positive,
      negative_mentions: negative,
      average_score: scores.length > 0 ? scores.reduce((a, s) => a + s, 0) / scores.length : null,
    });
  }
  return summaries;
}

export async function gatherSocial(request: GatherRequest, deps: SocialDeps): Promise<SocialOutput> {
  if (!deps.sentiment) {
    throw new Error('Social sentiment needs FINNHUB_API_KEY');
  }
  const now = (deps.clock ?? (() => new Date()))();
  const from = new Date(now.getTime() - WINDOW_DAYS * 86_400_000).toISOString().slice(0, 10);

  const platforms = summarizeSentiment(
    await deps.sentiment.socialSentiment(request.ticker, from, now.toISOString().slice(0, 10))
  );

  const timestamp = now.toISOString();
  return {
    source: 'social',
    ticker: request.ticker,
    company: request.companyName,
    timestamp,
    markdown: renderSourceHeader('Social Research', request, timestamp) + renderSocialMarkdown(platforms, WINDOW_DAYS),
    post_count: platforms.reduce((sum, p) => sum + p.mentions, 0),
  };
}

export function createSocialSource(deps: SocialDeps): SourceHandler<'social'> {
  return request => gatherSocial(request, deps);
}
