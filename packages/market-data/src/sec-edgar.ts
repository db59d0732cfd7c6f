// SEC EDGAR client — recent filings by ticker
// EDGAR requires a descriptive User-Agent on every request.

import { cachedFetchJson, CacheTTL } from './client.js';
import { SecSubmissionsSchema, SecTickerMapSchema, SymbolSchema } from './schemas.js';
import type { Filing, FilingsResult } from './types.js';

const SEC_BASE = process.env.SEC_BASE_URL || 'https://www.sec.gov';
const SEC_DATA_BASE = process.env.SEC_DATA_BASE_URL || 'https://data.sec.gov';
const DEFAULT_USER_AGENT = 'equity-research research-bot@example.com';
const MAX_FILINGS = 20;

export interface SecEdgarClientConfig {
  userAgent?: string;
  baseUrl?: string;
  dataBaseUrl?: string;
  cacheTtl?: number;
}

export class SecEdgarClient {
  readonly name = 'SEC EDGAR';
  private userAgent: string;
  private baseUrl: string;
  private dataBaseUrl: string;
  private cacheTtl?: number;

  constructor(config: SecEdgarClientConfig = {}) {
    this.userAgent = config.userAgent ?? process.env.SEC_USER_AGENT ?? DEFAULT_USER_AGENT;
    this.baseUrl = config.baseUrl ?? SEC_BASE;
    this.dataBaseUrl = config.dataBaseUrl ?? SEC_DATA_BASE;
    this.cacheTtl = config.cacheTtl;
  }

  /**
   * Most recent filings (at most 20), newest first.
   * Never throws: failures come back as `{ symbol, error }`.
   */
  async getFilings(rawSymbol: string): Promise<FilingsResult> {
    const symbol = rawSymbol.trim().toUpperCase();
    try {
      const ticker = SymbolSchema.parse(rawSymbol);
      const cik = await this.lookupCik(ticker);
      if (!cik) {
        return { symbol, error: `CIK not found for ${ticker}` };
      }

      const url = new URL(`/submissions/CIK${cik}.json`, this.dataBaseUrl);
      const body = await cachedFetchJson(url, {
        provider: this.name,
        cacheTtl: this.cacheTtl ?? CacheTTL.SHORT,
        headers: { 'User-Agent': this.userAgent },
      });

      const parsed = SecSubmissionsSchema.safeParse(body);
      if (!parsed.success) {
        return { symbol, error: 'Unexpected submissions payload' };
      }

      const recent = parsed.data.filings.recent;
      const filings: Filing[] = [];
      const count = Math.min(recent.form.length, MAX_FILINGS);
      for (let i = 0; i < count; i++) {
        filings.push({
          form: recent.form[i] ?? '',
          filing_date: recent.filingDate[i] ?? '',
          accession_number: recent.accessionNumber[i] ?? '',
          primary_document: recent.primaryDocument[i] ?? '',
        });
      }

      return {
        symbol: ticker,
        cik,
        company_name: parsed.data.name ?? ticker,
        filings,
      };
    } catch (err) {
      return { symbol, error: err instanceof Error ? err.message : String(err) };
    }
  }

  /** Resolve a ticker to its zero-padded 10-digit CIK */
  private async lookupCik(ticker: string): Promise<string | null> {
    const url = new URL('/files/company_tickers.json', this.baseUrl);
    const body = await cachedFetchJson(url, {
      provider: this.name,
      cacheTtl: CacheTTL.LONG,
      headers: { 'User-Agent': this.userAgent },
    });

    const parsed = SecTickerMapSchema.safeParse(body);
    if (!parsed.success) return null;

    for (const entry of Object.values(parsed.data)) {
      if (entry.ticker.toUpperCase() === ticker) {
        return String(entry.cik_str).padStart(10, '0');
      }
    }
    return null;
  }
}
