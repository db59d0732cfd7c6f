// Equity research agents
// Orchestrates specialist analysts and workflow patterns over market, fundamentals,
// macro and regulatory data

export { ResearchOrchestrator, BatchResearcher, buildComparative } from './orchestrator/index.js';
export type { OrchestratorConfig, BatchOptions, BatchProgress, BatchResult, SymbolResult } from './orchestrator/index.js';
export {
  ResearchPlanner, defaultPlan, DataCollector, ReflectionEngine, fallbackReflection, fallbackScore,
  buildMemoryEntry, createSpecialist, createSpecialistTeam, routingQuery, sectorOf,
} from './orchestrator/index.js';

export { BaseAnalyst, LlmAnalyst } from './agents/base-analyst.js';
export type { SpecialistAgent } from './agents/base-analyst.js';
export { MarketAnalyst } from './agents/market-analyst.js';
export { FundamentalsAnalyst, mergeFundamentals } from './agents/fundamentals-analyst.js';
export { EconomicAnalyst } from './agents/economic-analyst.js';
export { RegulatoryAnalyst } from './agents/regulatory-analyst.js';
export { createAnalysisResult, normalizeRecommendations } from './agents/analysis-result.js';

export * from './workflows/index.js';
export * from './memory/index.js';
export * from './llm/index.js';
export { loadConfig, AGENT_CATALOG, AGENT_NAMES, describeAgent } from './config/index.js';
export type { ResearchConfig, AgentCapability, SpecialistKind } from './config/index.js';

export * from './types/index.js';

export {
  ResearchError, ModelCallError, ModelOutputParseError, ValidationError, DataSourceError, ConfigError, errorMessage,
} from './utils/errors.js';
export { createLogger, setLogLevel } from './utils/logger.js';
export type { Logger, LogLevel, LogThreshold } from './utils/logger.js';
export { computePriceMetrics, priceChange, priceChangePercent, rangePosition } from './utils/derived-metrics.js';
export { formatReport } from './utils/report-formatter.js';

export { toDataSourceClient } from './src/market-data-adapter.js';
