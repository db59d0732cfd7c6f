// AnalysisResult construction with confidence validation

import type { AnalysisResult, DataRecord } from '../types/research.js';
import { ValidationError } from '../utils/errors.js';

export interface AnalysisResultInit {
  agent_name: string;
  data_source: string;
  findings: DataRecord;
  confidence_score: number;
  recommendations: string[];
  llm_reasoning: string;
  timestamp?: string;
}

export function createAnalysisResult(init: AnalysisResultInit): AnalysisResult {
  const confidence = init.confidence_score;
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new ValidationError(
      `Confidence score must be between 0.0 and 1.0, got ${confidence} (${init.agent_name})`,
    );
  }

  return {
    agent_name: init.agent_name,
    timestamp: init.timestamp ?? new Date().toISOString(),
    data_source: init.data_source,
    findings: init.findings,
    confidence_score: confidence,
    recommendations: init.recommendations,
    llm_reasoning: init.llm_reasoning,
  };
}

/** Array → its string entries; single string → one-item list; anything else → [] */
export function normalizeRecommendations(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  if (typeof value === 'string') return [value];
  return [];
}
