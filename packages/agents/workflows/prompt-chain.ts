// Prompt chaining workflow — ingest → preprocess → classify → extract insights → summarize

import type { DataRecord, WorkflowResult, WorkflowStep } from '../types/research.js';
import type { StructuredModelCaller } from '../llm/structured-caller.js';
import { decode, InsightsSchema, SummarySchema } from '../llm/schemas.js';
import { CALL_SETTINGS, SYSTEM_PROMPTS, insightsPrompt, summaryPrompt } from '../config/prompts.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('PromptChain');

export const PROMPT_CHAIN_NAME = 'Prompt Chain Workflow';

interface Ingested {
  raw_data: DataRecord;
  ingested_at: string;
}

interface Preprocessed {
  symbol: string;
  structured_data: DataRecord;
  timestamp: string;
}

interface Classified {
  symbol: string;
  categories: { market_data: boolean; fundamental_data: boolean; economic_context: boolean };
}

export function fallbackInsights(symbol: string): string[] {
  return [
    `Analysis completed for ${symbol}`,
    'Key metrics evaluated',
    'Investment factors assessed',
  ];
}

export function fallbackSummary(symbol: string, insights: readonly string[]): string {
  return `Investment analysis for ${symbol} completed. Key insights: ${insights.slice(0, 2).join(', ')}.`;
}

export class PromptChainWorkflow {
  readonly name = PROMPT_CHAIN_NAME;

  constructor(private readonly caller: StructuredModelCaller) {}

  async execute(symbol: string, data: DataRecord): Promise<WorkflowResult> {
    const start = performance.now();
    const steps: WorkflowStep[] = [];

    const ingested = this.ingest(data);
    steps.push({ step: 1, name: 'Ingest', output: 'Data ingested' });

    const preprocessed = this.preprocess(ingested, symbol);
    steps.push({ step: 2, name: 'Preprocess', output: 'Data structured' });

    const classified = this.classify(preprocessed);
    steps.push({ step: 3, name: 'Classify', output: 'Data classified' });

    const insights = await this.extractInsights(classified, preprocessed.structured_data);
    steps.push({ step: 4, name: 'Extract (LLM)', output: insights });

    const summary = await this.summarize(symbol, insights);
    steps.push({ step: 5, name: 'Summarize (LLM)', output: summary });

    return {
      workflow_name: this.name,
      timestamp: new Date().toISOString(),
      steps_completed: steps.length,
      final_output: summary,
      intermediate_results: steps,
      execution_time_seconds: (performance.now() - start) / 1000,
    };
  }

  private ingest(data: DataRecord): Ingested {
    return { raw_data: data, ingested_at: new Date().toISOString() };
  }

  private preprocess(ingested: Ingested, symbol: string): Preprocessed {
    return {
      symbol,
      structured_data: ingested.raw_data,
      timestamp: new Date().toISOString(),
    };
  }

  private classify(preprocessed: Preprocessed): Classified {
    return {
      symbol: preprocessed.symbol,
      categories: {
        market_data: true,
        fundamental_data: true,
        economic_context: false,
      },
    };
  }

  private async extractInsights(classified: Classified, data: DataRecord): Promise<string[]> {
    const symbol = classified.symbol;
    try {
      const response = await this.caller.call(
        {
          system: SYSTEM_PROMPTS.insights,
          prompt: insightsPrompt(symbol, classified.categories, data),
          ...CALL_SETTINGS.insights,
        },
        { onParseError: 'throw' },
      );
      const decoded = decode(InsightsSchema, response.json);
      const insights = decoded.kind === 'typed' ? decoded.value.insights.filter(i => i.trim() !== '') : [];
      if (insights.length > 0) return insights;
      log.warn('Model returned no insights; using defaults', { symbol });
    } catch (err) {
      log.warn('Insight extraction failed; using defaults', { symbol, error: errorMessage(err) });
    }
    return fallbackInsights(symbol);
  }

  private async summarize(symbol: string, insights: string[]): Promise<string> {
    try {
      const response = await this.caller.call(
        {
          system: SYSTEM_PROMPTS.summary,
          prompt: summaryPrompt(symbol, insights),
          ...CALL_SETTINGS.summary,
        },
        { onParseError: 'throw' },
      );
      const decoded = decode(SummarySchema, response.json);
      if (decoded.kind === 'typed' && decoded.value.summary) return decoded.value.summary;
      log.warn('Model returned an empty summary; using default', { symbol });
    } catch (err) {
      log.warn('Summary generation failed; using default', { symbol, error: errorMessage(err) });
    }
    return fallbackSummary(symbol, insights);
  }
}
