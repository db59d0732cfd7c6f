import { describe, it, expect } from 'vitest';
import { createAnalysisResult, normalizeRecommendations } from '../agents/analysis-result.js';
import { ValidationError } from '../utils/errors.js';

function makeInit(overrides: Partial<Parameters<typeof createAnalysisResult>[0]> = {}) {
  return {
    agent_name: 'MarketDataAgent',
    data_source: 'Yahoo Finance',
    findings: { price_trend: 'neutral' },
    confidence_score: 0.85,
    recommendations: ['Hold'],
    llm_reasoning: '{"price_trend":"neutral"}',
    ...overrides,
  };
}

describe('createAnalysisResult', () => {
  it('builds a result with a timestamp', () => {
    const result = createAnalysisResult(makeInit({ timestamp: '2024-01-02T00:00:00.000Z' }));
    expect(result).toEqual({
      agent_name: 'MarketDataAgent',
      timestamp: '2024-01-02T00:00:00.000Z',
      data_source: 'Yahoo Finance',
      findings: { price_trend: 'neutral' },
      confidence_score: 0.85,
      recommendations: ['Hold'],
      llm_reasoning: '{"price_trend":"neutral"}',
    });
  });

  it('accepts the bounds 0 and 1', () => {
    expect(createAnalysisResult(makeInit({ confidence_score: 0 })).confidence_score).toBe(0);
    expect(createAnalysisResult(makeInit({ confidence_score: 1 })).confidence_score).toBe(1);
  });

  it('rejects a confidence outside [0, 1]', () => {
    expect(() => createAnalysisResult(makeInit({ confidence_score: 1.2 }))).toThrow(ValidationError);
    expect(() => createAnalysisResult(makeInit({ confidence_score: -0.1 }))).toThrow(
      'Confidence score must be between 0.0 and 1.0, got -0.1 (MarketDataAgent)',
    );
    expect(() => createAnalysisResult(makeInit({ confidence_score: NaN }))).toThrow(ValidationError);
  });
});

describe('normalizeRecommendations', () => {
  it('keeps the strings of a list', () => {
    expect(normalizeRecommendations(['Buy', 3, null, 'Hold'])).toEqual(['Buy', 'Hold']);
  });

  it('wraps a single string', () => {
    expect(normalizeRecommendations('Buy')).toEqual(['Buy']);
  });

  it('returns an empty list otherwise', () => {
    expect(normalizeRecommendations(undefined)).toEqual([]);
    expect(normalizeRecommendations({ first: 'Buy' })).toEqual([]);
  });
});
