// Evaluator-optimizer workflow — score, annotate, re-score until the threshold or the iteration cap

import type { DataRecord, OptimizationIteration, OptimizationResult } from '../types/research.js';
import type { StructuredModelCaller } from '../llm/structured-caller.js';
import { decode, EvaluationSchema } from '../llm/schemas.js';
import { CALL_SETTINGS, SYSTEM_PROMPTS, evaluationPrompt } from '../config/prompts.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('EvaluatorOptimizer');

export const EVALUATOR_OPTIMIZER_NAME = 'Evaluator-Optimizer Workflow';
export const FALLBACK_SCORE = 0.75;
export const FALLBACK_FEEDBACK = 'Evaluation completed with fallback';
const EXCERPT_LENGTH = 500;

export interface EvaluatorOptimizerOptions {
  maxIterations?: number;
  qualityThreshold?: number;
}

interface Evaluation {
  overall_score: number;
  feedback: string[];
}

export class EvaluatorOptimizerWorkflow {
  readonly name = EVALUATOR_OPTIMIZER_NAME;
  readonly maxIterations: number;
  readonly qualityThreshold: number;

  constructor(private readonly caller: StructuredModelCaller, options: EvaluatorOptimizerOptions = {}) {
    this.maxIterations = options.maxIterations ?? 3;
    this.qualityThreshold = options.qualityThreshold ?? 0.8;
  }

  /** Mutates `analysis` in place on every optimize step */
  async execute(analysis: DataRecord): Promise<OptimizationResult> {
    const iterations: OptimizationIteration[] = [];

    for (let i = 0; i < this.maxIterations; i++) {
      const evaluation = await this.evaluate(analysis);
      iterations.push({
        iteration: i + 1,
        quality_score: evaluation.overall_score,
        feedback: evaluation.feedback,
      });
      log.debug(`Iteration ${i + 1} scored ${evaluation.overall_score}`);

      if (evaluation.overall_score >= this.qualityThreshold) break;
      if (i < this.maxIterations - 1) this.optimize(analysis, evaluation);
    }

    const last = iterations[iterations.length - 1];
    return {
      workflow_name: this.name,
      iterations,
      final_quality_score: last ? last.quality_score : FALLBACK_SCORE,
      optimization_applied: iterations.length > 1,
      timestamp: new Date().toISOString(),
    };
  }

  private async evaluate(analysis: DataRecord): Promise<Evaluation> {
    const excerpt = JSON.stringify(analysis, null, 2).slice(0, EXCERPT_LENGTH);
    try {
      const response = await this.caller.call(
        {
          system: SYSTEM_PROMPTS.evaluation,
          prompt: evaluationPrompt(excerpt),
          ...CALL_SETTINGS.evaluation,
        },
        { onParseError: 'throw' },
      );
      const decoded = decode(EvaluationSchema, response.json);
      if (decoded.kind === 'typed') {
        return { overall_score: decoded.value.overall_score, feedback: decoded.value.feedback };
      }
      log.warn('Evaluation reply did not match schema; using fallback score');
    } catch (err) {
      log.warn('Evaluation failed; using fallback score', { error: errorMessage(err) });
    }
    return { overall_score: FALLBACK_SCORE, feedback: [FALLBACK_FEEDBACK] };
  }

  // Deterministic annotation, no model call
  private optimize(analysis: DataRecord, evaluation: Evaluation): void {
    const round = typeof analysis.optimization_round === 'number' ? analysis.optimization_round : 0;
    analysis.optimized = true;
    analysis.optimization_round = round + 1;
    analysis.improvements_applied = evaluation.feedback;
  }
}
