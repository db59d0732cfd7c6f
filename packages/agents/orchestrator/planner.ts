// Research planning — one model call, deterministic default plan on any failure

import type { ResearchPlan } from '../types/research.js';
import type { StructuredModelCaller } from '../llm/structured-caller.js';
import { decode, PlanSchema } from '../llm/schemas.js';
import { CALL_SETTINGS, SYSTEM_PROMPTS, planPrompt } from '../config/prompts.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('Planner');

export function defaultPlan(symbol: string): ResearchPlan {
  return Object.freeze({
    symbol,
    objectives: [
      'Analyze current market position and trends',
      'Evaluate financial health and profitability',
      'Assess macroeconomic context',
      'Review regulatory compliance',
    ],
    data_sources: ['Yahoo Finance', 'Alpha Vantage', 'FRED', 'SEC EDGAR'],
    analysis_steps: [
      'Gather market data',
      'Analyze fundamentals',
      'Evaluate economic environment',
      'Review filings',
      'Synthesize findings',
    ],
    expected_outputs: [
      'Market analysis',
      'Fundamental assessment',
      'Economic context',
      'Investment recommendation',
    ],
    reasoning: 'Standard comprehensive financial analysis plan',
    timestamp: new Date().toISOString(),
    llm_powered: false,
  });
}

export class ResearchPlanner {
  constructor(private readonly caller: StructuredModelCaller) {}

  async plan(symbol: string): Promise<ResearchPlan> {
    try {
      const response = await this.caller.call(
        {
          system: SYSTEM_PROMPTS.plan,
          prompt: planPrompt(symbol),
          ...CALL_SETTINGS.plan,
        },
        { onParseError: 'throw' },
      );
      const decoded = decode(PlanSchema, response.json);
      if (decoded.kind === 'typed') {
        const plan = decoded.value;
        log.info(`Plan created for ${symbol}`, {
          objectives: plan.objectives.length,
          steps: plan.analysis_steps.length,
        });
        return Object.freeze({
          symbol,
          objectives: plan.objectives,
          data_sources: plan.data_sources,
          analysis_steps: plan.analysis_steps,
          expected_outputs: plan.expected_outputs,
          reasoning: plan.reasoning,
          timestamp: new Date().toISOString(),
          llm_powered: true,
        });
      }
      log.warn('Plan reply did not match schema; using default plan', { symbol });
    } catch (err) {
      log.warn('Planning failed; using default plan', { symbol, error: errorMessage(err) });
    }
    return defaultPlan(symbol);
  }
}
