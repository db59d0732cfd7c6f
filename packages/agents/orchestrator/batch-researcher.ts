// Batch research — runs many symbols on one orchestrator with a concurrency limit
// and builds a comparative summary table

import type { ResearchOrchestrator } from './coordinator.js';
import type { ResearchReport } from '../types/research.js';
import { errorMessage } from '../utils/errors.js';

export interface BatchOptions {
  /** Max concurrent research cycles (default: 1) */
  concurrency?: number;
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface SymbolResult {
  symbol: string;
  report?: ResearchReport;
  error?: string;
  durationMs: number;
}

export interface BatchResult {
  results: SymbolResult[];
  comparative: string;
  totalDurationMs: number;
}

export class BatchResearcher {
  constructor(private readonly orchestrator: ResearchOrchestrator) {}

  async research(symbols: readonly string[], options: BatchOptions = {}): Promise<BatchResult> {
    const { onProgress } = options;
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const totalStart = Date.now();
    const results: SymbolResult[] = [];
    let completed = 0;

    // Process in chunks respecting the concurrency limit
    for (let i = 0; i < symbols.length; i += concurrency) {
      const chunk = symbols.slice(i, i + concurrency);

      const chunkResults = await Promise.all(chunk.map(async (symbol): Promise<SymbolResult> => {
        const symbolStart = Date.now();
        onProgress?.({ completed, total: symbols.length, current: symbol, status: 'running' });

        try {
          const report = await this.orchestrator.conduct(symbol);
          completed += 1;
          onProgress?.({ completed, total: symbols.length, current: symbol, status: 'completed' });
          return { symbol: report.symbol, report, durationMs: Date.now() - symbolStart };
        } catch (err) {
          const error = errorMessage(err);
          completed += 1;
          onProgress?.({ completed, total: symbols.length, current: symbol, status: 'failed', error });
          return { symbol: symbol.trim().toUpperCase(), error, durationMs: Date.now() - symbolStart };
        }
      }));

      results.push(...chunkResults);
    }

    return {
      results,
      comparative: buildComparative(results),
      totalDurationMs: Date.now() - totalStart,
    };
  }
}

function trendOf(report: ResearchReport): string {
  const trend = report.analyses.market.findings.price_trend;
  if (typeof trend !== 'string' || trend.trim() === '') return 'N/A';
  // First word is the call (bullish/bearish/neutral); the rest is explanation
  return trend.trim().split(/\s+/)[0].replace(/[^A-Za-z-]/g, '') || 'N/A';
}

/**
 * Markdown comparison across symbols: quality score, routed agent,
 * market trend and status.
 */
export function buildComparative(results: readonly SymbolResult[]): string {
  const successful = results.filter(r => r.report);
  const failed = results.filter(r => r.error !== undefined);

  if (successful.length === 0) {
    return '## Comparative Research Summary\n\nNo symbols were successfully researched.';
  }

  const lines: string[] = [
    '## Comparative Research Summary',
    '',
    `**Symbols researched:** ${successful.length}/${results.length}`,
    '',
    '| Symbol | Quality Score | Routed Agent | Market Trend | Status |',
    '|--------|---------------|--------------|--------------|--------|',
  ];

  for (const r of results) {
    if (r.report) {
      const quality = r.report.reflection.overall_quality_score.toFixed(2);
      const routed = r.report.workflows.routing.selected_agent;
      lines.push(`| ${r.symbol} | ${quality} | ${routed} | ${trendOf(r.report)} | completed |`);
    } else {
      lines.push(`| ${r.symbol} | N/A | N/A | N/A | failed |`);
    }
  }

  if (failed.length > 0) {
    lines.push('', '### Failed Symbols', '');
    for (const r of failed) {
      lines.push(`- **${r.symbol}**: ${r.error}`);
    }
  }

  return lines.join('\n');
}
