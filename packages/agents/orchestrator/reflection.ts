// Self-reflection on a completed cycle — model review with a deterministic fallback

import type {
  AgentAnalyses, Reflection, ResearchPlan, WorkflowOutputs,
} from '../types/research.js';
import type { StructuredModelCaller } from '../llm/structured-caller.js';
import { decode, ReflectionSchema } from '../llm/schemas.js';
import { CALL_SETTINGS, SYSTEM_PROMPTS, reflectionPrompt } from '../config/prompts.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { ROUTING_NAME } from '../workflows/routing.js';

const log = createLogger('Reflection');

export const FALLBACK_BASE_SCORE = 0.75;
export const FALLBACK_MAX_SCORE = 0.92;

export interface CycleOutcome {
  symbol: string;
  plan: ResearchPlan;
  analyses: AgentAnalyses;
  workflows: WorkflowOutputs;
}

export function fallbackScore(agentsRun: number, workflowsRun: number): number {
  return Math.min(FALLBACK_BASE_SCORE + 0.05 * agentsRun + 0.03 * workflowsRun, FALLBACK_MAX_SCORE);
}

export function fallbackReflection(agentsRun: readonly string[], workflowsRun: readonly string[]): Reflection {
  const score = fallbackScore(agentsRun.length, workflowsRun.length);
  return {
    overall_quality_score: score,
    dimension_scores: {
      completeness: score,
      data_quality: score,
      analysis_depth: score,
      actionability: score,
    },
    strengths: [
      ...agentsRun.map(name => `${name} analysis completed`),
      ...workflowsRun.map(name => `${name} executed`),
    ],
    weaknesses: ['Quality review was not model-assessed'],
    improvements: ['Repeat reflection with model review available'],
    llm_powered: false,
    timestamp: new Date().toISOString(),
  };
}

function describeCycle(outcome: CycleOutcome): string {
  const { analyses, workflows, plan } = outcome;
  const lines = [
    `Plan: ${plan.objectives.length} objectives (${plan.llm_powered ? 'model-generated' : 'default plan'})`,
    'Agent analyses:',
  ];
  for (const result of Object.values(analyses)) {
    const raw = 'raw_analysis' in result.findings ? ', unstructured reply' : '';
    lines.push(`- ${result.agent_name}: confidence ${result.confidence_score}, ${result.recommendations.length} recommendations${raw}`);
  }
  lines.push(
    'Workflows:',
    `- ${workflows.prompt_chain.workflow_name}: ${workflows.prompt_chain.final_output}`,
    `- ${workflows.routing.routing_method} routing selected ${workflows.routing.selected_agent}`,
    `- ${workflows.evaluator_optimizer.workflow_name}: final score ${workflows.evaluator_optimizer.final_quality_score} after ${workflows.evaluator_optimizer.iterations.length} iteration(s)`,
  );
  return lines.join('\n');
}

export class ReflectionEngine {
  constructor(private readonly caller: StructuredModelCaller) {}

  async reflect(outcome: CycleOutcome): Promise<Reflection> {
    const agentsRun = Object.values(outcome.analyses).map(result => result.agent_name);
    const workflowsRun = [
      outcome.workflows.prompt_chain.workflow_name,
      ROUTING_NAME,
      outcome.workflows.evaluator_optimizer.workflow_name,
    ];

    try {
      const response = await this.caller.call(
        {
          system: SYSTEM_PROMPTS.reflection,
          prompt: reflectionPrompt(outcome.symbol, describeCycle(outcome)),
          ...CALL_SETTINGS.reflection,
        },
        { onParseError: 'throw' },
      );
      const decoded = decode(ReflectionSchema, response.json);
      if (decoded.kind === 'typed') {
        const r = decoded.value;
        return {
          overall_quality_score: r.overall_quality_score,
          dimension_scores: r.dimension_scores,
          strengths: r.strengths,
          weaknesses: r.weaknesses,
          improvements: r.improvements,
          llm_powered: true,
          timestamp: new Date().toISOString(),
        };
      }
      log.warn('Reflection reply did not match schema; using fallback', { symbol: outcome.symbol });
    } catch (err) {
      log.warn('Reflection failed; using fallback', { symbol: outcome.symbol, error: errorMessage(err) });
    }
    return fallbackReflection(agentsRun, workflowsRun);
  }
}
