// Yahoo Finance client — quote, key statistics and recent news

import { cachedFetchJson, CacheTTL, DataSourceError } from './client.js';
import { YahooQuoteSummarySchema, YahooSearchSchema, SymbolSchema } from './schemas.js';
import { num, rec, str } from './values.js';
import type { NewsItem, StockInfo } from './types.js';

const YAHOO_BASE = process.env.YAHOO_BASE_URL || 'https://query2.finance.yahoo.com';
const QUOTE_MODULES = ['price', 'summaryDetail', 'financialData', 'defaultKeyStatistics', 'assetProfile'];

export interface YahooFinanceClientConfig {
  baseUrl?: string;
  cacheTtl?: number;
}

export class YahooFinanceClient {
  readonly name = 'Yahoo Finance';
  private baseUrl: string;
  private cacheTtl?: number;

  constructor(config: YahooFinanceClientConfig = {}) {
    this.baseUrl = config.baseUrl ?? YAHOO_BASE;
    this.cacheTtl = config.cacheTtl;
  }

  async getStockInfo(rawSymbol: string): Promise<StockInfo> {
    const symbol = SymbolSchema.parse(rawSymbol);
    const url = new URL(`/v10/finance/quoteSummary/${encodeURIComponent(symbol)}`, this.baseUrl);
    url.searchParams.set('modules', QUOTE_MODULES.join(','));

    let body: unknown;
    try {
      body = await cachedFetchJson(url, { provider: this.name, cacheTtl: this.cacheTtl ?? CacheTTL.REALTIME });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new DataSourceError(`Failed to fetch data for ${symbol}: ${message}`, this.name, undefined, { cause: err });
    }

    const parsed = YahooQuoteSummarySchema.safeParse(body);
    const result = parsed.success ? parsed.data.quoteSummary.result?.[0] : undefined;
    if (!result) {
      throw new DataSourceError(`Failed to fetch data for ${symbol}: no quote data returned`, this.name);
    }

    return mapQuoteSummary(symbol, result);
  }

  async getNews(rawSymbol: string, limit = 5): Promise<NewsItem[]> {
    const symbol = SymbolSchema.parse(rawSymbol);
    const url = new URL('/v1/finance/search', this.baseUrl);
    url.searchParams.set('q', symbol);
    url.searchParams.set('newsCount', String(limit));
    url.searchParams.set('quotesCount', '0');

    const body = await cachedFetchJson(url, { provider: this.name, cacheTtl: this.cacheTtl ?? CacheTTL.SHORT });
    const parsed = YahooSearchSchema.safeParse(body);
    if (!parsed.success) return [];

    return parsed.data.news.slice(0, limit).map(article => {
      const published = num(article, 'providerPublishTime');
      return {
        title: str(article, 'title') ?? '',
        publisher: str(article, 'publisher') ?? '',
        link: str(article, 'link') ?? '',
        published_date: published !== undefined ? new Date(published * 1000).toISOString() : '',
        type: str(article, 'type') ?? '',
      };
    });
  }
}

/** Map a quoteSummary result onto the flat stock-info record */
export function mapQuoteSummary(symbol: string, result: Record<string, unknown>): StockInfo {
  const price = rec(result, 'price');
  const summary = rec(result, 'summaryDetail');
  const financial = rec(result, 'financialData');
  const stats = rec(result, 'defaultKeyStatistics');
  const profile = rec(result, 'assetProfile');

  return {
    symbol,
    company_name: str(price, 'longName') ?? str(price, 'shortName') ?? 'N/A',
    sector: str(profile, 'sector') ?? 'N/A',
    industry: str(profile, 'industry') ?? 'N/A',
    market_cap: num(price, 'marketCap') ?? num(summary, 'marketCap') ?? 0,
    current_price: num(financial, 'currentPrice') ?? num(price, 'regularMarketPrice') ?? 0,
    previous_close: num(summary, 'previousClose') ?? num(price, 'regularMarketPreviousClose') ?? 0,
    open_price: num(summary, 'open') ?? num(price, 'regularMarketOpen') ?? 0,
    day_high: num(summary, 'dayHigh') ?? num(price, 'regularMarketDayHigh') ?? 0,
    day_low: num(summary, 'dayLow') ?? num(price, 'regularMarketDayLow') ?? 0,
    volume: num(summary, 'volume') ?? num(price, 'regularMarketVolume') ?? 0,
    pe_ratio: num(summary, 'trailingPE') ?? null,
    forward_pe: num(summary, 'forwardPE') ?? num(stats, 'forwardPE') ?? null,
    '52_week_high': num(summary, 'fiftyTwoWeekHigh') ?? 0,
    '52_week_low': num(summary, 'fiftyTwoWeekLow') ?? 0,
    beta: num(summary, 'beta') ?? num(stats, 'beta') ?? null,
    dividend_yield: num(summary, 'dividendYield') ?? null,
    profit_margin: num(financial, 'profitMargins') ?? num(stats, 'profitMargins') ?? null,
    operating_margin: num(financial, 'operatingMargins') ?? null,
    revenue: num(financial, 'totalRevenue') ?? 0,
    earnings_growth: num(financial, 'earningsGrowth') ?? null,
    revenue_growth: num(financial, 'revenueGrowth') ?? null,
    ebitda: num(financial, 'ebitda') ?? null,
    debt_to_equity: num(financial, 'debtToEquity') ?? null,
    return_on_equity: num(financial, 'returnOnEquity') ?? null,
    currency: str(price, 'currency') ?? 'USD',
  };
}
