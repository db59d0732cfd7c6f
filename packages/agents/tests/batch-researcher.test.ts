import { describe, it, expect } from 'vitest';
import { BatchResearcher, buildComparative, type BatchProgress } from '../orchestrator/batch-researcher.js';
import { ResearchOrchestrator } from '../orchestrator/coordinator.js';
import type { DataSourceClient } from '../types/data-source.js';
import { FakeBackend, fakeDataSource, happyReplies, quoteFixture } from './helpers.js';

function makeBatch(failing: readonly string[] = []) {
  const base = fakeDataSource();
  const dataSource: DataSourceClient = {
    ...base,
    getPrimaryQuoteAndFundamentals: async symbol => {
      if (failing.includes(symbol)) throw new Error(`Failed to fetch data for ${symbol}: no quote data returned`);
      return quoteFixture({ symbol });
    },
  };
  const orchestrator = new ResearchOrchestrator({ dataSource, backend: new FakeBackend(happyReplies()) });
  return { orchestrator, batch: new BatchResearcher(orchestrator) };
}

describe('BatchResearcher', () => {
  it('researches every symbol in order', async () => {
    const { batch } = makeBatch();

    const result = await batch.research(['AAA', 'BBB', 'CCC'], { concurrency: 2 });

    expect(result.results.map(r => r.symbol)).toEqual(['AAA', 'BBB', 'CCC']);
    expect(result.results.every(r => r.report !== undefined && r.error === undefined)).toBe(true);
    expect(result.totalDurationMs).toBeGreaterThanOrEqual(0);
  });

  it('shares one memory store across the batch', async () => {
    const { batch, orchestrator } = makeBatch();
    await batch.research(['AAA', 'BBB']);
    expect(orchestrator.memory.entries().map(e => e.stock_symbol)).toEqual(['AAA', 'BBB']);
  });

  it('records failures without stopping the batch', async () => {
    const { batch } = makeBatch(['BAD']);

    const result = await batch.research(['AAA', 'BAD', 'CCC']);

    expect(result.results.map(r => r.symbol)).toEqual(['AAA', 'BAD', 'CCC']);
    expect(result.results[1].report).toBeUndefined();
    expect(result.results[1].error).toBe('Failed to fetch data for BAD: no quote data returned');
  });

  it('reports progress', async () => {
    const { batch } = makeBatch(['BAD']);
    const progress: BatchProgress[] = [];

    await batch.research(['AAA', 'BAD'], { onProgress: p => progress.push(p) });

    expect(progress.map(p => `${p.current}:${p.status}:${p.completed}/${p.total}`)).toEqual([
      'AAA:running:0/2',
      'AAA:completed:1/2',
      'BAD:running:1/2',
      'BAD:failed:2/2',
    ]);
  });

  it('counts completions across a concurrent chunk', async () => {
    const { batch } = makeBatch();
    const progress: BatchProgress[] = [];

    await batch.research(['AAA', 'BBB', 'CCC'], { concurrency: 3, onProgress: p => progress.push(p) });

    const finished = progress.filter(p => p.status !== 'running');
    expect(finished.map(p => `${p.completed}/${p.total}`)).toEqual(['1/3', '2/3', '3/3']);
    expect(progress.filter(p => p.status === 'running').map(p => p.completed)).toEqual([0, 0, 0]);
  });

  it('builds a comparative table', async () => {
    const { batch } = makeBatch(['BAD']);

    const result = await batch.research(['AAA', 'BAD']);

    expect(result.comparative.split('\n')).toEqual([
      '## Comparative Research Summary',
      '',
      '**Symbols researched:** 1/2',
      '',
      '| Symbol | Quality Score | Routed Agent | Market Trend | Status |',
      '|--------|---------------|--------------|--------------|--------|',
      '| AAA | 0.88 | FundamentalsAgent | bullish | completed |',
      '| BAD | N/A | N/A | N/A | failed |',
      '',
      '### Failed Symbols',
      '',
      '- **BAD**: Failed to fetch data for BAD: no quote data returned',
    ]);
  });
});

describe('buildComparative', () => {
  it('says so when nothing succeeded', () => {
    expect(buildComparative([{ symbol: 'BAD', error: 'boom', durationMs: 1 }])).toBe(
      '## Comparative Research Summary\n\nNo symbols were successfully researched.',
    );
  });
});
