import { z } from 'zod';
import { HttpClient, type HttpClientOptions } from './http-client.js';
import { DataParseError } from './errors.js';
import type { CompanyFacts, CikLookup, RegistrantInfo } from './types.js';

/**
 * SEC EDGAR API client.
 *
 * Uses the free EDGAR APIs:
 * - www.sec.gov/files/company_tickers.json for ticker -> CIK
 * - data.sec.gov/api/xbrl/companyfacts/ for XBRL data
 * - data.sec.gov/submissions/ for the filing index
 *
 * Rate limited to 10 req/s per SEC fair access policy.
 */

const BASE_URL = 'https://data.sec.gov';
const TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json';

const companyFactsSchema = z.object({
  cik: z.union([z.number(), z.string()]).optional(),
  entityName: z.string().optional(),
  facts: z.record(
    z.record(
      z.object({
        label: z.string().nullable().optional().transform(v => v ?? undefined),
        description: z.string().nullable().optional().transform(v => v ?? undefined),
        units: z.record(z.array(z.unknown())).optional(),
      })
    )
  ).optional(),
});

const tickersSchema = z.record(
  z.object({
    cik_str: z.union([z.number(), z.string()]),
    ticker: z.string(),
    title: z.string(),
  })
);

const optionalText = z
  .string()
  .nullable()
  .optional()
  .transform(v => (v && v.trim() !== '' ? v.trim() : null));

const submissionsSchema = z.object({
  cik: z.string().optional(),
  name: optionalText,
  sicDescription: optionalText,
  description: optionalText,
  filings: z.object({
    recent: z.object({
      accessionNumber: z.array(z.string()),
      filingDate: z.array(z.string()),
      form: z.array(z.string()),
      primaryDocument: z.array(z.string()).optional(),
      primaryDocDescription: z.array(z.string()).optional(),
    }),
  }),
});

export interface FilingSummary {
  accession_number: string;
  filing_date: string;
  form: string;
  description: string;
  url: string | null;
}

/** Capability the fundamentals source needs: raw facts for a resolved CIK */
export interface FactsProvider {
  getCompanyFacts(cik: string): Promise<CompanyFacts>;
}

/** Capability for classification and description of a filer */
export interface RegistrantInfoProvider {
  getRegistrantInfo(cik: string): Promise<RegistrantInfo>;
}

type Submissions = z.infer<typeof submissionsSchema>;

export type SecClientOptions = Omit<HttpClientOptions, 'provider' | 'headers' | 'forbiddenHint'> & {
  userAgent: string;
};

export class SecClient implements FactsProvider, RegistrantInfoProvider {
  private readonly http: HttpClient;

  constructor(options: SecClientOptions) {
    const { userAgent, ...rest } = options;
    this.http = new HttpClient({
      ...rest,
      provider: 'sec',
      requestsPerSecond: rest.requestsPerSecond ?? 10,
      headers: { 'User-Agent': userAgent },
      forbiddenHint: 'Check SEC_USER_AGENT: SEC requires a User-Agent with contact info.',
    });
  }

  /**
   * Fetch all XBRL facts for a company.
   * CIK is zero-padded to 10 digits.
   */
  async getCompanyFacts(cik: string): Promise<CompanyFacts> {
    const url = `${BASE_URL}/api/xbrl/companyfacts/CIK${cik.padStart(10, '0')}.json`;
    const parsed = companyFactsSchema.safeParse(await this.http.getJson(url, 168)); // 7 days
    if (!parsed.success) {
      throw new DataParseError(`Unexpected companyfacts shape for CIK ${cik}`, url);
    }
    return parsed.data;
  }

  /** Full ticker -> CIK table. Cached aggressively since tickers rarely change. */
  async getCompanyTickers(): Promise<CikLookup[]> {
    const parsed = tickersSchema.safeParse(await this.http.getJson(TICKERS_URL, 168));
    if (!parsed.success) {
      throw new DataParseError('Unexpected company tickers shape', TICKERS_URL);
    }
    return Object.values(parsed.data).map(entry => ({
      cik: String(entry.cik_str).padStart(10, '0'),
      ticker: entry.ticker.toUpperCase(),
      name: entry.title,
    }));
  }

  private async getSubmissions(cik: string): Promise<Submissions> {
    const url = `${BASE_URL}/submissions/CIK${cik.padStart(10, '0')}.json`;
    const parsed = submissionsSchema.safeParse(await this.http.getJson(url, 24));
    if (!parsed.success) {
      throw new DataParseError(`Unexpected submissions shape for CIK ${cik}`, url);
    }
    return parsed.data;
  }

  /** Name, SIC industry and self-description; shares the cached submissions download */
  async getRegistrantInfo(cik: string): Promise<RegistrantInfo> {
    const submissions = await this.getSubmissions(cik);
    return {
      name: submissions.name,
      industry: submissions.sicDescription,
      description: submissions.description,
    };
  }

  /** Recent filings from the submissions index, newest first */
  async getRecentFilings(cik: string, forms?: readonly string[]): Promise<FilingSummary[]> {
    const paddedCik = cik.padStart(10, '0');
    const recent = (await this.getSubmissions(cik)).filings.recent;
    const filings: FilingSummary[] = [];
    for (let i = 0; i < recent.accessionNumber.length; i++) {
      const form = recent.form[i] ?? '';
      if (forms && !forms.includes(form)) continue;

      const accession = recent.accessionNumber[i];
      const doc = recent.primaryDocument?.[i];
      filings.push({
        accession_number: accession,
        filing_date: recent.filingDate[i] ?? '',
        form,
        description: recent.primaryDocDescription?.[i] ?? '',
        url: doc
          ? `https://www.sec.gov/Archives/edgar/data/${Number(paddedCik)}/${accession.replace(/-/g, '')}/${doc}`
          : null,
      });
    }
    return filings;
  }
}
