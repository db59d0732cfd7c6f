// Data collection phase — one mandatory source, the rest degrade independently

import type { DataSourceClient } from '../types/data-source.js';
import type { DataRecord, RawDataSnapshot } from '../types/research.js';
import { createLogger } from '../utils/logger.js';
import { DataSourceError, errorMessage } from '../utils/errors.js';

const log = createLogger('DataCollector');

export const NEWS_LIMIT = 5;
export const FED_FUNDS_SERIES = 'FEDFUNDS';
export const UNEMPLOYMENT_SERIES = 'UNRATE';

export interface Degradation {
  source: string;
  reason: string;
}

export type DegradationHandler = (symbol: string, degradation: Degradation) => void;

export class DataCollector {
  constructor(
    private readonly source: DataSourceClient,
    private readonly onDegraded?: DegradationHandler,
  ) {}

  async collect(symbol: string): Promise<RawDataSnapshot> {
    // Mandatory: errors propagate unchanged
    const quote = await this.source.getPrimaryQuoteAndFundamentals(symbol);
    if (Object.keys(quote).length === 0) {
      throw new DataSourceError(`No primary market data returned for ${symbol}`);
    }

    const news = await this.optional<DataRecord[]>(symbol, 'news', [], () =>
      this.source.getRecentNews(symbol, NEWS_LIMIT));

    const fundamentals = this.source.fundamentals;
    const overview = fundamentals
      ? await this.optional<DataRecord | null>(symbol, 'company_overview', null, () => fundamentals.getFundamentalsOverview(symbol))
      : this.absent(symbol, 'company_overview');

    const macro = this.source.macro;
    const fedFunds = macro
      ? await this.optional<DataRecord | null>(symbol, FED_FUNDS_SERIES, null, () => macro.getMacroIndicator(FED_FUNDS_SERIES, 1))
      : this.absent(symbol, FED_FUNDS_SERIES);
    const unemployment = macro
      ? await this.optional<DataRecord | null>(symbol, UNEMPLOYMENT_SERIES, null, () => macro.getMacroIndicator(UNEMPLOYMENT_SERIES, 1))
      : this.absent(symbol, UNEMPLOYMENT_SERIES);

    let filings: DataRecord;
    try {
      filings = await this.source.getRegulatoryFilings(symbol);
    } catch (err) {
      const reason = errorMessage(err);
      this.degrade(symbol, { source: 'sec_filings', reason });
      filings = { error: reason };
    }

    return {
      quote,
      news,
      company_overview: overview,
      economic_indicators: {
        fed_funds_rate: fedFunds,
        unemployment_rate: unemployment,
      },
      sec_filings: filings,
    };
  }

  private async optional<T>(
    symbol: string,
    source: string,
    fallback: T,
    load: () => Promise<T>,
  ): Promise<T> {
    try {
      return await load();
    } catch (err) {
      this.degrade(symbol, { source, reason: errorMessage(err) });
      return fallback;
    }
  }

  private absent(symbol: string, source: string): null {
    this.degrade(symbol, { source, reason: 'not configured' });
    return null;
  }

  private degrade(symbol: string, degradation: Degradation): void {
    log.warn(`${degradation.source} unavailable for ${symbol}`, { reason: degradation.reason });
    this.onDegraded?.(symbol, degradation);
  }
}
