// Research cycle records
// Field names are the snake_case keys exchanged with the model and emitted in reports

export type DataRecord = Record<string, unknown>;

export interface ResearchPlan {
  readonly symbol: string;
  readonly objectives: readonly string[];
  readonly data_sources: readonly string[];
  readonly analysis_steps: readonly string[];
  readonly expected_outputs: readonly string[];
  readonly reasoning: string;
  readonly timestamp: string;
  readonly llm_powered: boolean;   // false for the deterministic default plan
}

export interface AnalysisResult {
  readonly agent_name: string;
  readonly timestamp: string;
  readonly data_source: string;
  readonly findings: DataRecord;
  readonly confidence_score: number;   // 0-1
  readonly recommendations: string[];
  readonly llm_reasoning: string;
}

export interface WorkflowStep {
  step: number;
  name: string;
  output: unknown;
}

export interface WorkflowResult {
  workflow_name: string;
  timestamp: string;
  steps_completed: number;
  final_output: string;
  intermediate_results: WorkflowStep[];
  execution_time_seconds: number;
}

export type RoutingMethod = 'LLM-powered' | 'fallback';

export interface RoutingDecision {
  query: string;
  selected_agent: string;
  reasoning: string;
  available_agents: string[];
  routing_method: RoutingMethod;
  timestamp: string;
}

export interface OptimizationIteration {
  iteration: number;
  quality_score: number;
  feedback: string[];
}

export interface OptimizationResult {
  workflow_name: string;
  iterations: OptimizationIteration[];
  final_quality_score: number;
  optimization_applied: boolean;
  timestamp: string;
}

export interface DimensionScores {
  completeness: number;
  data_quality: number;
  analysis_depth: number;
  actionability: number;
}

export interface Reflection {
  overall_quality_score: number;
  dimension_scores: Partial<DimensionScores>;   // missing dimensions default during learning
  strengths: string[];
  weaknesses: string[];
  improvements: string[];
  llm_powered: boolean;
  timestamp: string;
}

export interface EconomicIndicators {
  fed_funds_rate: DataRecord | null;
  unemployment_rate: DataRecord | null;
}

export interface RawDataSnapshot {
  quote: DataRecord;
  news: DataRecord[];
  company_overview: DataRecord | null;
  economic_indicators: EconomicIndicators;
  sec_filings: DataRecord;
}

export interface AgentAnalyses {
  market: AnalysisResult;
  fundamentals: AnalysisResult;
  economic: AnalysisResult;
  regulatory: AnalysisResult;
}

export interface WorkflowOutputs {
  prompt_chain: WorkflowResult;
  routing: RoutingDecision;
  evaluator_optimizer: OptimizationResult;
}

export interface MemoryStatus {
  previously_analyzed: boolean;
  previous_analysis_timestamp: string | null;
  memory_entries: number;
  max_memory_entries: number;
}

export interface ResearchReport {
  symbol: string;
  research_plan: ResearchPlan;
  raw_data: RawDataSnapshot;
  analyses: AgentAnalyses;
  workflows: WorkflowOutputs;
  reflection: Reflection;
  memory_status: MemoryStatus;
  generated_at: string;
  execution_time_seconds: number;
}
