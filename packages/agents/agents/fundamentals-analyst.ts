// Fundamentals specialist — profitability, growth, balance sheet and valuation

import type { DataRecord } from '../types/research.js';
import type { StructuredModelCaller } from '../llm/structured-caller.js';
import { fundamentalsPrompt } from '../config/prompts.js';
import { LlmAnalyst } from './base-analyst.js';

export class FundamentalsAnalyst extends LlmAnalyst {
  constructor(caller: StructuredModelCaller) {
    super('fundamentals', caller);
  }

  protected buildPrompt(symbol: string, data: DataRecord): string {
    return fundamentalsPrompt(symbol, data);
  }
}

/**
 * Quote record overlaid with the optional company overview.
 * Overview values only fill fields the quote lacks.
 */
export function mergeFundamentals(quote: DataRecord, overview: DataRecord | null): DataRecord {
  if (!overview) return { ...quote };
  const merged: DataRecord = { ...quote };
  for (const [key, value] of Object.entries(overview)) {
    const current = merged[key];
    if (current === undefined || current === null || current === '' || current === 'N/A') {
      merged[key] = value;
    }
  }
  return merged;
}
