// Adapts the market-data package to the core's DataSourceClient interface

import type { MarketDataSource } from '@equity-research/market-data';
import type { DataSourceClient } from '../types/data-source.js';

export function toDataSourceClient(source: MarketDataSource): DataSourceClient {
  const client: DataSourceClient = {
    getPrimaryQuoteAndFundamentals: symbol => source.getStockInfo(symbol),
    getRecentNews: (symbol, limit) => source.getNews(symbol, limit),
    getRegulatoryFilings: symbol => source.getFilings(symbol),
  };

  const getOverview = source.getCompanyOverview;
  if (getOverview) {
    client.fundamentals = { getFundamentalsOverview: symbol => getOverview(symbol) };
  }

  const getSeries = source.getMacroSeries;
  if (getSeries) {
    client.macro = { getMacroIndicator: (seriesId, limit) => getSeries(seriesId, limit) };
  }

  return client;
}
