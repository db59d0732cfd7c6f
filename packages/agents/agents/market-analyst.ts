// Market data specialist — price trend, volatility and 52-week positioning

import type { DataRecord } from '../types/research.js';
import type { StructuredModelCaller } from '../llm/structured-caller.js';
import { marketPrompt } from '../config/prompts.js';
import { computePriceMetrics } from '../utils/derived-metrics.js';
import { LlmAnalyst } from './base-analyst.js';

export class MarketAnalyst extends LlmAnalyst {
  constructor(caller: StructuredModelCaller) {
    super('market', caller);
  }

  protected buildPrompt(symbol: string, quote: DataRecord): string {
    return marketPrompt(symbol, quote, computePriceMetrics(quote));
  }
}
