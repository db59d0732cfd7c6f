export { ResearchOrchestrator, routingQuery, sectorOf, UNKNOWN_SECTOR } from './coordinator.js';
export type { OrchestratorConfig } from './coordinator.js';
export { BatchResearcher, buildComparative } from './batch-researcher.js';
export type { BatchOptions, BatchProgress, BatchResult, SymbolResult } from './batch-researcher.js';
export { ResearchPlanner, defaultPlan } from './planner.js';
export { DataCollector, NEWS_LIMIT, FED_FUNDS_SERIES, UNEMPLOYMENT_SERIES } from './data-collector.js';
export type { Degradation, DegradationHandler } from './data-collector.js';
export { ReflectionEngine, fallbackReflection, fallbackScore } from './reflection.js';
export type { CycleOutcome } from './reflection.js';
export { buildMemoryEntry, DEFAULT_DIMENSION_SCORE } from './learning.js';
export { createSpecialist, createSpecialistTeam } from './specialist-factory.js';
export type { SpecialistTeam } from './specialist-factory.js';
