// Alpha Vantage client — company overview (fundamentals)

import { cachedFetchJson, CacheTTL, DataSourceError } from './client.js';
import { AlphaVantageOverviewSchema, SymbolSchema } from './schemas.js';
import { num, str } from './values.js';
import type { CompanyOverview } from './types.js';

const AV_BASE = process.env.ALPHA_VANTAGE_BASE_URL || 'https://www.alphavantage.co';

export interface AlphaVantageClientConfig {
  apiKey?: string;
  baseUrl?: string;
  cacheTtl?: number;
}

export class AlphaVantageClient {
  readonly name = 'Alpha Vantage';
  private apiKey: string;
  private baseUrl: string;
  private cacheTtl?: number;

  constructor(config: AlphaVantageClientConfig = {}) {
    const apiKey = config.apiKey ?? process.env.ALPHA_VANTAGE_API_KEY;
    if (!apiKey) {
      throw new DataSourceError('ALPHA_VANTAGE_API_KEY is not set', 'Alpha Vantage');
    }
    this.apiKey = apiKey;
    this.baseUrl = config.baseUrl ?? AV_BASE;
    this.cacheTtl = config.cacheTtl;
  }

  /**
   * Fetch the company overview. Returns null when the API answers with an
   * empty object or an informational note (unknown symbol, quota message).
   */
  async getCompanyOverview(rawSymbol: string): Promise<CompanyOverview | null> {
    const symbol = SymbolSchema.parse(rawSymbol);
    const url = new URL('/query', this.baseUrl);
    url.searchParams.set('function', 'OVERVIEW');
    url.searchParams.set('symbol', symbol);
    url.searchParams.set('apikey', this.apiKey);

    const body = await cachedFetchJson(url, { provider: this.name, cacheTtl: this.cacheTtl ?? CacheTTL.MEDIUM });
    const parsed = AlphaVantageOverviewSchema.safeParse(body);
    if (!parsed.success) return null;

    const data = parsed.data;
    if (!str(data, 'Symbol') || 'Note' in data || 'Information' in data) return null;

    return {
      symbol: str(data, 'Symbol') ?? symbol,
      name: str(data, 'Name') ?? 'N/A',
      description: str(data, 'Description') ?? '',
      sector: str(data, 'Sector') ?? 'N/A',
      eps: num(data, 'EPS') ?? null,
      book_value: num(data, 'BookValue') ?? null,
      dividend_yield: num(data, 'DividendYield') ?? null,
      analyst_target_price: num(data, 'AnalystTargetPrice') ?? null,
      peg_ratio: num(data, 'PEGRatio') ?? null,
      profit_margin: num(data, 'ProfitMargin') ?? null,
      return_on_equity: num(data, 'ReturnOnEquityTTM') ?? null,
      quarterly_revenue_growth: num(data, 'QuarterlyRevenueGrowthYOY') ?? null,
      quarterly_earnings_growth: num(data, 'QuarterlyEarningsGrowthYOY') ?? null,
    };
  }
}
