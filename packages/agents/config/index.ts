export { loadConfig, DEFAULT_MODEL, DEFAULT_MAX_MEMORY, DEFAULT_CACHE_TTL_SECONDS } from './env.js';
export type { ResearchConfig } from './env.js';
export { AGENT_CATALOG, AGENT_NAMES, describeAgent } from './agent-catalog.js';
export type { AgentCapability, SpecialistKind } from './agent-catalog.js';
export * from './prompts.js';
