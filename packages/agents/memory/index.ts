export { AgentMemory, MAX_INSIGHTS } from './agent-memory.js';
export type { AgentMemorySnapshot } from './agent-memory.js';
export { BoundedMemoryStore } from './memory-store.js';
export type { MemoryStore } from './memory-store.js';
