// External collaborators consumed by the research core

import type { DataRecord } from './research.js';

/** Fundamentals overview capability (present only when its provider is configured) */
export interface FundamentalsCapability {
  getFundamentalsOverview(symbol: string): Promise<DataRecord | null>;
}

/** Macro series capability (present only when its provider is configured) */
export interface MacroCapability {
  getMacroIndicator(seriesId: string, limit: number): Promise<DataRecord | null>;
}

export interface DataSourceClient {
  /** Mandatory. Failure is fatal to a research cycle. */
  getPrimaryQuoteAndFundamentals(symbol: string): Promise<DataRecord>;
  getRecentNews(symbol: string, limit: number): Promise<DataRecord[]>;
  /** Expected to return an `{ error }` marker rather than throw */
  getRegulatoryFilings(symbol: string): Promise<DataRecord>;
  fundamentals?: FundamentalsCapability;
  macro?: MacroCapability;
}

export interface ModelRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

/** Text-generation backend. Failures surface as ModelCallError. */
export interface ModelBackend {
  readonly model: string;
  complete(request: ModelRequest): Promise<string>;
}
