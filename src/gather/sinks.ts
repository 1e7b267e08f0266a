import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { errorMessage } from '../core/errors.js';
import type { FetchLike } from '../core/http-client.js';

/**
 * Persistence sinks for gathered research: a storage sink per source
 * document and a reindex sink triggered once per gather.
 */

export interface StoreOutcome {
  success: boolean;
  key: string;
  message: string;
}

export interface ReindexResult {
  success: boolean;
  message: string;
}

export interface StoreInput {
  content: string;
  ticker: string;
  source: string;
  /** ISO timestamp of the gather run */
  timestamp: string;
}

export interface StorageSink {
  store(input: StoreInput): Promise<StoreOutcome>;
}

export interface ReindexSink {
  trigger(): Promise<ReindexResult>;
}

/** research/<YYYY-MM-DD>/<TICKER>_<source>.md */
export function storageKey(ticker: string, source: string, timestamp: string): string {
  return `research/${timestamp.slice(0, 10)}/${ticker}_${source}.md`;
}

/** Writes each document under a root directory at its storage key */
export class FileStorageSink implements StorageSink {
  constructor(private readonly rootDir: string) {}

  async store(input: StoreInput): Promise<StoreOutcome> {
    const key = storageKey(input.ticker, input.source, input.timestamp);
    const path = join(this.rootDir, key);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, input.content, 'utf-8');
    return { success: true, key, message: `Stored ${input.content.length} chars at ${path}` };
  }
}

export interface HttpReindexSinkOptions {
  url: string | null;
  token?: string | null;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

/**
 * POSTs to a knowledge-base reindex endpoint. Without a configured URL it
 * reports failure instead of throwing.
 */
export class HttpReindexSink implements ReindexSink {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpReindexSinkOptions) {
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async trigger(): Promise<ReindexResult> {
    const { url, token } = this.options;
    if (!url) {
      return { success: false, message: 'reindex endpoint not configured' };
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (token) headers.Authorization = `Bearer ${token}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers,
        body: '{}',
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 15_000),
      });
    } catch (err) {
      return { success: false, message: `Reindex request failed: ${errorMessage(err)}` };
    }

    if (!response.ok) {
      return { success: false, message: `Reindex endpoint returned ${response.status}` };
    }
    return { success: true, message: 'Reindex triggered' };
  }
}
