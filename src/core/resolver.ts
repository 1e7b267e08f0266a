import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { CikLookup } from './types.js';

/**
 * Identifier resolver: ticker -> SEC CIK.
 *
 * The lookup table is an explicit CikCache object created once per process
 * and injected, so tests can start from an empty or pre-seeded table. It is
 * only a performance optimization: a cold cache is filled in full from one
 * download of the SEC ticker list.
 */

export function normalizeTicker(ticker: string): string {
  return ticker.trim().replace(/^\$/, '').toUpperCase();
}

export class CikCache {
  private readonly entries = new Map<string, CikLookup>();

  constructor(seed: Iterable<CikLookup> = []) {
    this.seed(seed);
  }

  get(ticker: string): CikLookup | undefined {
    return this.entries.get(normalizeTicker(ticker));
  }

  seed(entries: Iterable<CikLookup>): void {
    for (const entry of entries) {
      this.entries.set(normalizeTicker(entry.ticker), entry);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

export interface TickerDirectory {
  getCompanyTickers(): Promise<CikLookup[]>;
}

export interface IdentifierResolver {
  /** Returns null when the ticker is unknown or the lookup failed */
  resolve(ticker: string): Promise<CikLookup | null>;
}

export class CikResolver implements IdentifierResolver {
  private readonly logger: Logger;

  constructor(
    private readonly directory: TickerDirectory,
    private readonly cache: CikCache = new CikCache(),
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child({ component: 'cik-resolver' });
  }

  async resolve(ticker: string): Promise<CikLookup | null> {
    const cached = this.cache.get(ticker);
    if (cached) return cached;

    try {
      this.cache.seed(await this.directory.getCompanyTickers());
    } catch (err) {
      this.logger.warn({ ticker, err: errorMessage(err) }, 'CIK lookup failed');
      return null;
    }

    return this.cache.get(ticker) ?? null;
  }
}
