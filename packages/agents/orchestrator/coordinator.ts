// Research orchestrator — plan → collect → analyze → workflows → reflect → learn
// Owns the bounded memory store; every phase runs to completion before the next starts

import { randomUUID } from 'node:crypto';
import type { DataSourceClient, ModelBackend } from '../types/data-source.js';
import type {
  AgentAnalyses, DataRecord, ResearchReport, WorkflowOutputs,
} from '../types/research.js';
import {
  DOMAIN_EVENT_TYPES, SimpleEventBus,
  type DomainEventType, type EventBus, type ResearchEventPayload,
} from '../types/events.js';
import { StructuredModelCaller } from '../llm/structured-caller.js';
import { AGENT_NAMES } from '../config/agent-catalog.js';
import { DEFAULT_MAX_MEMORY } from '../config/env.js';
import { mergeFundamentals } from '../agents/fundamentals-analyst.js';
import { PromptChainWorkflow } from '../workflows/prompt-chain.js';
import { RoutingWorkflow } from '../workflows/routing.js';
import {
  EvaluatorOptimizerWorkflow, type EvaluatorOptimizerOptions,
} from '../workflows/evaluator-optimizer.js';
import { BoundedMemoryStore, type MemoryStore } from '../memory/memory-store.js';
import type { AgentMemory } from '../memory/agent-memory.js';
import { createSpecialistTeam, type SpecialistTeam } from './specialist-factory.js';
import { ResearchPlanner } from './planner.js';
import { DataCollector } from './data-collector.js';
import { ReflectionEngine } from './reflection.js';
import { buildMemoryEntry } from './learning.js';
import { readNumber } from '../utils/derived-metrics.js';
import { createLogger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';

const log = createLogger('Orchestrator');

export const UNKNOWN_SECTOR = 'Unknown';

export interface OrchestratorConfig {
  dataSource: DataSourceClient;
  backend: ModelBackend;
  /** Injected learning store; a fresh bounded store is created when omitted */
  memory?: MemoryStore;
  /** Capacity of the store created when `memory` is omitted. Default: 10 */
  maxMemoryEntries?: number;
  evaluator?: EvaluatorOptimizerOptions;
  onEvent?: (event: { type: string; payload: unknown }) => void;
}

export function routingQuery(symbol: string): string {
  return `What is the investment outlook for ${symbol}?`;
}

/** Sector from the quote, or "Unknown" when absent or "N/A" */
export function sectorOf(quote: DataRecord): string {
  const sector = quote.sector;
  if (typeof sector !== 'string') return UNKNOWN_SECTOR;
  const trimmed = sector.trim();
  return trimmed === '' || trimmed === 'N/A' ? UNKNOWN_SECTOR : trimmed;
}

export class ResearchOrchestrator {
  private readonly eventBus: EventBus;
  private readonly memoryStore: MemoryStore;
  private readonly specialists: SpecialistTeam;
  private readonly planner: ResearchPlanner;
  private readonly collector: DataCollector;
  private readonly promptChain: PromptChainWorkflow;
  private readonly router: RoutingWorkflow;
  private readonly evaluator: EvaluatorOptimizerWorkflow;
  private readonly reflection: ReflectionEngine;

  constructor(config: OrchestratorConfig) {
    this.eventBus = new SimpleEventBus();
    this.memoryStore = config.memory ?? new BoundedMemoryStore(config.maxMemoryEntries ?? DEFAULT_MAX_MEMORY);

    const caller = new StructuredModelCaller(config.backend);
    this.specialists = createSpecialistTeam(caller);
    this.planner = new ResearchPlanner(caller);
    this.collector = new DataCollector(config.dataSource, (symbol, degradation) =>
      this.emit('DataSourceDegraded', { symbol, source: degradation.source, reason: degradation.reason }));
    this.promptChain = new PromptChainWorkflow(caller);
    this.router = new RoutingWorkflow(caller);
    this.evaluator = new EvaluatorOptimizerWorkflow(caller, config.evaluator);
    this.reflection = new ReflectionEngine(caller);

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, (e) => handler({ type: e.type, payload: e.payload }));
      }
    }
  }

  get events(): EventBus {
    return this.eventBus;
  }

  get memory(): MemoryStore {
    return this.memoryStore;
  }

  mostRecentMemoryFor(symbol: string): AgentMemory | undefined {
    return this.memoryStore.mostRecentFor(symbol);
  }

  /**
   * Run one full research cycle. Resolves with a complete report or rejects;
   * a failure of the primary data source is never downgraded.
   */
  async conduct(rawSymbol: string): Promise<ResearchReport> {
    const symbol = rawSymbol.trim().toUpperCase();
    if (!symbol) throw new ValidationError('A stock symbol is required');

    const start = performance.now();
    const previous = this.memoryStore.mostRecentFor(symbol);
    log.info(`Research started for ${symbol}`, { previouslyAnalyzed: Boolean(previous) });
    this.emit('ResearchStarted', { symbol, previously_analyzed: Boolean(previous) });

    // ── Plan ──
    const plan = await this.planner.plan(symbol);
    this.emit('PlanCreated', { symbol, llm_powered: plan.llm_powered, objectives: plan.objectives.length });

    // ── Collect ──
    const rawData = await this.collector.collect(symbol);
    this.emit('DataCollected', {
      symbol,
      news: rawData.news.length,
      company_overview: rawData.company_overview !== null,
      fed_funds_rate: rawData.economic_indicators.fed_funds_rate !== null,
      unemployment_rate: rawData.economic_indicators.unemployment_rate !== null,
      sec_filings: !('error' in rawData.sec_filings),
    });

    // ── Analyze ──
    const quote = rawData.quote;
    const sector = sectorOf(quote);
    const { fed_funds_rate, unemployment_rate } = rawData.economic_indicators;

    const analyses: AgentAnalyses = {
      market: await this.specialists.market.analyze(symbol, quote),
      fundamentals: await this.specialists.fundamentals.analyze(
        symbol, mergeFundamentals(quote, rawData.company_overview)),
      economic: await this.specialists.economic.analyze(sector, {
        fed_funds_rate: readNumber(fed_funds_rate, 'latest_value') ?? null,
        unemployment_rate: readNumber(unemployment_rate, 'latest_value') ?? null,
        symbol,
      }),
      regulatory: await this.specialists.regulatory.analyze(symbol, rawData.sec_filings),
    };
    for (const result of Object.values(analyses)) {
      this.emit('AnalysisCompleted', {
        symbol,
        agent: result.agent_name,
        confidence: result.confidence_score,
      });
    }

    // ── Workflows ──
    const promptChain = await this.promptChain.execute(symbol, quote);
    this.emit('WorkflowCompleted', { symbol, workflow: promptChain.workflow_name });

    const routing = await this.router.route(routingQuery(symbol), AGENT_NAMES);
    this.emit('WorkflowCompleted', {
      symbol,
      workflow: this.router.name,
      selected_agent: routing.selected_agent,
      routing_method: routing.routing_method,
    });

    const evaluation = await this.evaluator.execute({
      market: analyses.market.findings,
      fundamentals: analyses.fundamentals.findings,
      economic: analyses.economic.findings,
      regulatory: analyses.regulatory.findings,
    });
    this.emit('WorkflowCompleted', {
      symbol,
      workflow: evaluation.workflow_name,
      final_quality_score: evaluation.final_quality_score,
    });

    const workflows: WorkflowOutputs = {
      prompt_chain: promptChain,
      routing,
      evaluator_optimizer: evaluation,
    };

    // ── Reflect ──
    const reflection = await this.reflection.reflect({ symbol, plan, analyses, workflows });
    this.emit('ReflectionCompleted', {
      symbol,
      overall_quality_score: reflection.overall_quality_score,
      llm_powered: reflection.llm_powered,
    });

    // ── Learn ──
    this.memoryStore.append(buildMemoryEntry(symbol, reflection));
    this.emit('MemoryStored', { symbol, memory_entries: this.memoryStore.size });

    const report: ResearchReport = {
      symbol,
      research_plan: plan,
      raw_data: rawData,
      analyses,
      workflows,
      reflection,
      memory_status: {
        previously_analyzed: previous !== undefined,
        previous_analysis_timestamp: previous?.timestamp ?? null,
        memory_entries: this.memoryStore.size,
        max_memory_entries: this.memoryStore.capacity,
      },
      generated_at: new Date().toISOString(),
      execution_time_seconds: (performance.now() - start) / 1000,
    };

    log.info(`Research completed for ${symbol}`, {
      quality: reflection.overall_quality_score,
      seconds: Number(report.execution_time_seconds.toFixed(2)),
    });
    this.emit('ResearchCompleted', {
      symbol,
      overall_quality_score: reflection.overall_quality_score,
      execution_time_seconds: report.execution_time_seconds,
    });

    return report;
  }

  private emit(type: DomainEventType, payload: ResearchEventPayload): void {
    this.eventBus.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: 'research-orchestrator',
      payload,
    });
  }
}
