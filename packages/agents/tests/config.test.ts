import { describe, it, expect } from 'vitest';
import { loadConfig, DEFAULT_MODEL } from '../config/env.js';
import { AGENT_NAMES, describeAgent } from '../config/agent-catalog.js';
import { ValidationError } from '../utils/errors.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      anthropicApiKey: undefined,
      model: DEFAULT_MODEL,
      maxMemoryEntries: 10,
      logLevel: 'info',
      alphaVantageApiKey: undefined,
      fredApiKey: undefined,
      secUserAgent: undefined,
      cacheTtlSeconds: 300,
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: 'test-key',
      RESEARCH_MODEL: 'test-model',
      RESEARCH_MAX_MEMORY: '25',
      LOG_LEVEL: 'DEBUG',
      ALPHA_VANTAGE_API_KEY: 'test-av-key',
      FRED_API_KEY: 'test-fred-key',
      SEC_USER_AGENT: 'Test Agent test@example.com',
      MARKET_DATA_CACHE_TTL: '0',
    });

    expect(config).toEqual({
      anthropicApiKey: 'test-key',
      model: 'test-model',
      maxMemoryEntries: 25,
      logLevel: 'debug',
      alphaVantageApiKey: 'test-av-key',
      fredApiKey: 'test-fred-key',
      secUserAgent: 'Test Agent test@example.com',
      cacheTtlSeconds: 0,
    });
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: '  ', RESEARCH_MAX_MEMORY: '', LOG_LEVEL: '' });
    expect(config.anthropicApiKey).toBeUndefined();
    expect(config.maxMemoryEntries).toBe(10);
    expect(config.logLevel).toBe('info');
  });

  it('names the invalid variable', () => {
    expect(() => loadConfig({ RESEARCH_MAX_MEMORY: '0' })).toThrow(ValidationError);
    expect(() => loadConfig({ RESEARCH_MAX_MEMORY: 'many' })).toThrow(/RESEARCH_MAX_MEMORY/);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});

describe('agent catalog', () => {
  it('lists agents in analysis order', () => {
    expect(AGENT_NAMES).toEqual(['MarketDataAgent', 'FundamentalsAgent', 'EconomicContextAgent', 'RegulatoryAgent']);
  });

  it('describes known and unknown agents', () => {
    expect(describeAgent('MarketDataAgent')).toBe('Analyzes price trends, volatility, market conditions');
    expect(describeAgent('Other')).toBe('Financial analysis');
  });
});
