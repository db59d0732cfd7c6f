// Learning phase — turns a reflection into a memory entry

import type { DimensionScores, Reflection } from '../types/research.js';
import { AgentMemory } from '../memory/agent-memory.js';

export const DEFAULT_DIMENSION_SCORE = 0.8;
export const LEARNED_STRENGTHS = 5;

const DIMENSIONS: readonly (keyof DimensionScores)[] = [
  'completeness', 'data_quality', 'analysis_depth', 'actionability',
];

export function buildMemoryEntry(symbol: string, reflection: Reflection): AgentMemory {
  const entry = new AgentMemory(symbol);

  for (const strength of reflection.strengths.slice(0, LEARNED_STRENGTHS)) {
    entry.addInsight(strength);
  }

  for (const dimension of DIMENSIONS) {
    entry.quality_scores[dimension] = reflection.dimension_scores[dimension] ?? DEFAULT_DIMENSION_SCORE;
  }
  entry.updateQuality(reflection.overall_quality_score);

  entry.recommendations = [...reflection.improvements];
  return entry;
}
