// Economic context specialist — rates and labour market against a sector

import type { DataRecord } from '../types/research.js';
import type { StructuredModelCaller } from '../llm/structured-caller.js';
import { economicPrompt } from '../config/prompts.js';
import { LlmAnalyst } from './base-analyst.js';

export class EconomicAnalyst extends LlmAnalyst {
  constructor(caller: StructuredModelCaller) {
    super('economic', caller);
  }

  protected buildPrompt(sector: string, data: DataRecord): string {
    return economicPrompt(sector, data);
  }
}
