// FRED client — macroeconomic series observations (FEDFUNDS, UNRATE, CPIAUCSL, ...)

import { cachedFetchJson, CacheTTL, DataSourceError } from './client.js';
import { FredObservationsSchema } from './schemas.js';
import type { MacroObservation, MacroSeries } from './types.js';

const FRED_BASE = process.env.FRED_BASE_URL || 'https://api.stlouisfed.org';

export interface FredClientConfig {
  apiKey?: string;
  baseUrl?: string;
  cacheTtl?: number;
}

export class FredClient {
  readonly name = 'FRED';
  private apiKey: string;
  private baseUrl: string;
  private cacheTtl?: number;

  constructor(config: FredClientConfig = {}) {
    const apiKey = config.apiKey ?? process.env.FRED_API_KEY;
    if (!apiKey) {
      throw new DataSourceError('FRED_API_KEY is not set', 'FRED');
    }
    this.apiKey = apiKey;
    this.baseUrl = config.baseUrl ?? FRED_BASE;
    this.cacheTtl = config.cacheTtl;
  }

  /**
   * Latest observations for a series, newest first.
   * FRED marks missing values with "."; those are skipped.
   */
  async getSeries(seriesId: string, limit = 1): Promise<MacroSeries | null> {
    const url = new URL('/fred/series/observations', this.baseUrl);
    url.searchParams.set('series_id', seriesId);
    url.searchParams.set('api_key', this.apiKey);
    url.searchParams.set('file_type', 'json');
    url.searchParams.set('sort_order', 'desc');
    url.searchParams.set('limit', String(limit));

    const body = await cachedFetchJson(url, { provider: this.name, cacheTtl: this.cacheTtl ?? CacheTTL.MEDIUM });
    const parsed = FredObservationsSchema.safeParse(body);
    if (!parsed.success) return null;

    const observations: MacroObservation[] = [];
    for (const obs of parsed.data.observations) {
      const value = parseFloat(obs.value);
      if (!isNaN(value)) observations.push({ date: obs.date, value });
    }

    const latest = observations[0];
    if (!latest) return null;

    return {
      series_id: seriesId,
      latest_value: latest.value,
      latest_date: latest.date,
      observations,
    };
  }
}
