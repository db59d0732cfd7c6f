// Bounded in-memory learning store — oldest entries are evicted past capacity

import { DEFAULT_MAX_MEMORY } from '../config/env.js';
import { ValidationError } from '../utils/errors.js';
import type { AgentMemory } from './agent-memory.js';

export interface MemoryStore {
  readonly capacity: number;
  readonly size: number;
  append(entry: AgentMemory): void;
  /** Newest-first scan for the latest entry on a symbol */
  mostRecentFor(symbol: string): AgentMemory | undefined;
  /** Entries in chronological order (oldest first) */
  entries(): AgentMemory[];
  clear(): void;
}

export class BoundedMemoryStore implements MemoryStore {
  private items: AgentMemory[] = [];
  readonly capacity: number;

  constructor(capacity = DEFAULT_MAX_MEMORY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError(`Memory capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  // Synchronous: no await between push and eviction
  append(entry: AgentMemory): void {
    this.items.push(entry);
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  mostRecentFor(symbol: string): AgentMemory | undefined {
    const target = symbol.toUpperCase();
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (this.items[i].stock_symbol.toUpperCase() === target) return this.items[i];
    }
    return undefined;
  }

  entries(): AgentMemory[] {
    return [...this.items];
  }

  clear(): void {
    this.items = [];
  }
}
