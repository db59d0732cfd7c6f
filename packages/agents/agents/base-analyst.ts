// Base specialist agent
// Model-backed specialists extend LlmAnalyst; rule-based ones extend BaseAnalyst directly

import { randomUUID } from 'node:crypto';
import type { AnalysisResult, DataRecord } from '../types/research.js';
import { AGENT_CATALOG, type AgentCapability, type SpecialistKind } from '../config/agent-catalog.js';
import { CALL_SETTINGS, SYSTEM_PROMPTS } from '../config/prompts.js';
import type { StructuredModelCaller } from '../llm/structured-caller.js';
import { createAnalysisResult, normalizeRecommendations } from './analysis-result.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface SpecialistAgent {
  readonly name: string;
  readonly capability: AgentCapability;
  analyze(subjectKey: string, payload: DataRecord): Promise<AnalysisResult>;
}

export abstract class BaseAnalyst implements SpecialistAgent {
  readonly agentId: string;
  readonly capability: AgentCapability;
  protected readonly log: Logger;

  constructor(kind: SpecialistKind) {
    this.agentId = randomUUID();
    this.capability = AGENT_CATALOG[kind];
    this.log = createLogger(this.capability.name);
  }

  get name(): string {
    return this.capability.name;
  }

  abstract analyze(subjectKey: string, payload: DataRecord): Promise<AnalysisResult>;

  protected buildResult(
    findings: DataRecord,
    recommendations: string[],
    llmReasoning: string,
    dataSource: string = this.capability.dataProvider,
  ): AnalysisResult {
    return createAnalysisResult({
      agent_name: this.name,
      data_source: dataSource,
      findings,
      confidence_score: this.capability.confidence,
      recommendations,
      llm_reasoning: llmReasoning,
    });
  }
}

type ModelBackedKind = Exclude<SpecialistKind, 'regulatory'>;

/**
 * One structured model call per analysis. Non-JSON replies are wrapped as raw
 * analysis; transport errors propagate to the caller.
 */
export abstract class LlmAnalyst extends BaseAnalyst {
  private readonly kind: ModelBackedKind;

  constructor(kind: ModelBackedKind, protected readonly caller: StructuredModelCaller) {
    super(kind);
    this.kind = kind;
  }

  protected abstract buildPrompt(subjectKey: string, payload: DataRecord): string;

  async analyze(subjectKey: string, payload: DataRecord): Promise<AnalysisResult> {
    this.log.info(`Analyzing ${subjectKey}`);

    const response = await this.caller.call(
      {
        system: SYSTEM_PROMPTS[this.kind],
        prompt: this.buildPrompt(subjectKey, payload),
        ...CALL_SETTINGS[this.kind],
      },
      { onParseError: 'fallback' },
    );

    if (response.source === 'fallback') {
      this.log.warn('Model reply was not JSON; keeping raw analysis', { subject: subjectKey });
    }

    return this.buildResult(
      response.json,
      normalizeRecommendations(response.json.recommendations),
      response.text,
      `${this.capability.dataProvider} + ${this.caller.model}`,
    );
  }
}
