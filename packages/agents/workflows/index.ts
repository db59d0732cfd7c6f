export { PromptChainWorkflow, PROMPT_CHAIN_NAME, fallbackInsights, fallbackSummary } from './prompt-chain.js';
export { RoutingWorkflow, ROUTING_NAME } from './routing.js';
export {
  EvaluatorOptimizerWorkflow, EVALUATOR_OPTIMIZER_NAME, FALLBACK_SCORE, FALLBACK_FEEDBACK,
} from './evaluator-optimizer.js';
export type { EvaluatorOptimizerOptions } from './evaluator-optimizer.js';
