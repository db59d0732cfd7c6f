// @equity-research/market-data — provider clients for quotes, fundamentals, macro series and filings

import { YahooFinanceClient } from './yahoo.js';
import { AlphaVantageClient } from './alpha-vantage.js';
import { FredClient } from './fred.js';
import { SecEdgarClient } from './sec-edgar.js';
import type { CompanyOverview, FilingsResult, MacroSeries, NewsItem, StockInfo } from './types.js';

export { YahooFinanceClient, mapQuoteSummary } from './yahoo.js';
export { AlphaVantageClient } from './alpha-vantage.js';
export { FredClient } from './fred.js';
export { SecEdgarClient } from './sec-edgar.js';
export { cachedFetchJson, clearCache, CacheTTL, DataSourceError } from './client.js';
export type { FetchJsonOptions } from './client.js';
export type * from './types.js';

export interface MarketDataConfig {
  alphaVantageApiKey?: string;
  fredApiKey?: string;
  secUserAgent?: string;
  cacheTtl?: number;
}

/**
 * Combined market data source. Stock info, news and filings are always
 * available; fundamentals and macro series only when their API keys are set.
 */
export interface MarketDataSource {
  getStockInfo(symbol: string): Promise<StockInfo>;
  getNews(symbol: string, limit?: number): Promise<NewsItem[]>;
  getFilings(symbol: string): Promise<FilingsResult>;
  getCompanyOverview?: (symbol: string) => Promise<CompanyOverview | null>;
  getMacroSeries?: (seriesId: string, limit?: number) => Promise<MacroSeries | null>;
}

export function createMarketDataSource(config: MarketDataConfig = {}): MarketDataSource {
  const yahoo = new YahooFinanceClient({ cacheTtl: config.cacheTtl });
  const sec = new SecEdgarClient({ userAgent: config.secUserAgent, cacheTtl: config.cacheTtl });

  const source: MarketDataSource = {
    getStockInfo: symbol => yahoo.getStockInfo(symbol),
    getNews: (symbol, limit) => yahoo.getNews(symbol, limit),
    getFilings: symbol => sec.getFilings(symbol),
  };

  if (config.alphaVantageApiKey) {
    const av = new AlphaVantageClient({ apiKey: config.alphaVantageApiKey, cacheTtl: config.cacheTtl });
    source.getCompanyOverview = symbol => av.getCompanyOverview(symbol);
  }

  if (config.fredApiKey) {
    const fred = new FredClient({ apiKey: config.fredApiKey, cacheTtl: config.cacheTtl });
    source.getMacroSeries = (seriesId, limit) => fred.getSeries(seriesId, limit);
  }

  return source;
}
