#!/usr/bin/env node
// Equity research CLI
//
// Usage:
//   research AAPL                  # full research cycle, Markdown report
//   research AAPL MSFT --batch 2   # several symbols, two at a time, comparative summary
//   research AAPL --json           # raw report JSON
//   research --help                # usage

import 'dotenv/config';
import { createMarketDataSource } from '@equity-research/market-data';
import { loadConfig, type ResearchConfig } from '../config/env.js';
import { AnthropicBackend } from '../llm/anthropic-backend.js';
import { ResearchOrchestrator } from '../orchestrator/coordinator.js';
import { BatchResearcher } from '../orchestrator/batch-researcher.js';
import { formatReport } from '../utils/report-formatter.js';
import { setLogLevel } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { toDataSourceClient } from './market-data-adapter.js';
import { CliUsageError, parseCliArgs, type CliOptions } from './cli-args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  green: isTTY ? '\x1b[32m' : '',
  red: isTTY ? '\x1b[31m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

// ── CLI ─────────────────────────────────────────────────────────────

class ResearchCli {
  async start(): Promise<void> {
    let options: CliOptions;
    try {
      options = parseCliArgs(process.argv.slice(2));
    } catch (err) {
      if (!(err instanceof CliUsageError)) throw err;
      console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
      this.printHelp();
      process.exitCode = 1;
      return;
    }

    if (options.help) {
      this.printHelp();
      return;
    }

    const config = loadConfig();
    setLogLevel(config.logLevel);

    if (!config.anthropicApiKey) {
      console.error(`  ${c('red', 'Error:')} ANTHROPIC_API_KEY environment variable is required.\n`);
      console.error('  Set it with: export ANTHROPIC_API_KEY=your-key-here\n');
      process.exitCode = 1;
      return;
    }

    const orchestrator = this.createOrchestrator(config, options);

    if (options.symbols.length === 1) {
      const report = await orchestrator.conduct(options.symbols[0]);
      console.log(options.json ? JSON.stringify(report, null, 2) : formatReport(report));
      return;
    }

    const batch = new BatchResearcher(orchestrator);
    const result = await batch.research(options.symbols, {
      concurrency: options.concurrency,
      onProgress: p => {
        if (p.status === 'running') return;
        const mark = p.status === 'completed' ? c('green', 'done') : c('red', 'failed');
        process.stderr.write(`  [${p.completed}/${p.total}] ${p.current} ${mark}\n`);
      },
    });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      for (const r of result.results) {
        if (r.report) console.log(formatReport(r.report));
      }
      console.log(result.comparative);
    }
    if (result.results.some(r => r.error !== undefined)) process.exitCode = 1;
  }

  private createOrchestrator(config: ResearchConfig, options: CliOptions): ResearchOrchestrator {
    const marketData = createMarketDataSource({
      alphaVantageApiKey: config.alphaVantageApiKey,
      fredApiKey: config.fredApiKey,
      secUserAgent: config.secUserAgent,
      cacheTtl: config.cacheTtlSeconds,
    });

    return new ResearchOrchestrator({
      dataSource: toDataSourceClient(marketData),
      backend: new AnthropicBackend({ apiKey: config.anthropicApiKey, model: config.model }),
      maxMemoryEntries: config.maxMemoryEntries,
      onEvent: options.json ? undefined : (event) => {
        if (event.type === 'PlanCreated' || event.type === 'DataCollected' || event.type === 'ReflectionCompleted') {
          process.stderr.write(`  ${c('dim', event.type)}\n`);
        }
      },
    });
  }

  printHelp(): void {
    console.log(`
  ${c('bold', 'Equity Research')} — multi-agent stock research

  ${c('bold', 'Usage:')}
    research <SYMBOL...> [options]

  ${c('bold', 'Options:')}
    --json                        Print the report as JSON
    --batch <n>                   Research up to n symbols at a time (default: 1)
    -h, --help                    Show this help

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY             Required. Your Anthropic API key.
    RESEARCH_MODEL                Model override (default: claude-haiku-4-5-20251001).
    RESEARCH_MAX_MEMORY           Learning entries kept (default: 10).
    ALPHA_VANTAGE_API_KEY         Optional. Enables company fundamentals.
    FRED_API_KEY                  Optional. Enables macro indicators.
    SEC_USER_AGENT                Contact string sent to SEC EDGAR.
    LOG_LEVEL                     debug, info, warn, error or silent (default: info).

  ${c('bold', 'Examples:')}
    research AAPL
    research AAPL MSFT NVDA --batch 3
    research TSLA --json > tsla.json
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new ResearchCli();
cli.start().catch((err: unknown) => {
  console.error(`${c('red', 'Fatal:')} ${errorMessage(err)}`);
  process.exit(1);
});
