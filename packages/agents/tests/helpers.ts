// Shared fakes for the research tests: a scripted model backend and an in-memory data source

import { SYSTEM_PROMPTS } from '../config/prompts.js';
import type { DataSourceClient, ModelBackend, ModelRequest } from '../types/data-source.js';
import type { DataRecord } from '../types/research.js';
import { ModelCallError } from '../utils/errors.js';

export type PromptKind = keyof typeof SYSTEM_PROMPTS;
export type Reply = string | Error | ((request: ModelRequest) => string);

const KINDS = Object.keys(SYSTEM_PROMPTS).filter((k): k is PromptKind => k in SYSTEM_PROMPTS);

export function kindOf(system: string): PromptKind | undefined {
  return KINDS.find(kind => system.startsWith(SYSTEM_PROMPTS[kind]));
}

/**
 * Model backend that answers by prompt kind. A list of replies is consumed in
 * order and its last entry repeats. Kinds without a reply fail like an
 * unreachable backend.
 */
export class FakeBackend implements ModelBackend {
  readonly model = 'test-model';
  readonly requests: ModelRequest[] = [];
  private readonly replies = new Map<PromptKind, Reply[]>();

  constructor(replies: Partial<Record<PromptKind, Reply | Reply[]>> = {}) {
    for (const kind of KINDS) {
      const reply = replies[kind];
      if (reply !== undefined) this.set(kind, reply);
    }
  }

  set(kind: PromptKind, reply: Reply | Reply[]): this {
    this.replies.set(kind, Array.isArray(reply) ? [...reply] : [reply]);
    return this;
  }

  callsFor(kind: PromptKind): ModelRequest[] {
    return this.requests.filter(r => kindOf(r.system) === kind);
  }

  async complete(request: ModelRequest): Promise<string> {
    this.requests.push(request);
    const kind = kindOf(request.system);
    const queue = kind ? this.replies.get(kind) : undefined;
    if (!kind || !queue || queue.length === 0) {
      throw new ModelCallError(`No scripted reply for ${kind ?? 'unknown prompt'}`);
    }
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) throw new ModelCallError('Reply queue exhausted');
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(request) : reply;
  }
}

export function json(value: unknown): string {
  return JSON.stringify(value);
}

/** Replies for a complete, fully model-powered cycle */
export function happyReplies(): Partial<Record<PromptKind, Reply>> {
  return {
    plan: json({
      objectives: ['Assess price momentum', 'Review margins'],
      data_sources: ['Yahoo Finance'],
      analysis_steps: ['Collect', 'Analyze'],
      expected_outputs: ['Recommendation'],
      reasoning: 'Large-cap technology name with broad coverage.',
    }),
    market: json({
      price_trend: 'bullish - trading above the prior close',
      volatility_assessment: 'moderate',
      valuation_opinion: 'fairly valued',
      technical_position: 'lower third of the 52-week range',
      key_observations: ['Steady volume'],
      recommendations: ['Accumulate on dips', 'Set a stop below the 52-week low'],
    }),
    fundamentals: json({
      profitability_assessment: 'strong',
      growth_assessment: 'moderate',
      financial_health: 'solid',
      valuation_assessment: 'reasonable',
      key_strengths: ['High margins'],
      key_concerns: ['Slowing growth'],
      recommendations: ['Hold'],
    }),
    economic: json({
      interest_rate_impact: 'neutral',
      employment_impact: 'supportive',
      inflation_impact: 'contained',
      sector_outlook: 'positive',
      key_risks: ['Rate volatility'],
      recommendations: ['Watch the next rate decision'],
    }),
    insights: json({ insights: ['Margins are expanding', 'Valuation is stretched', 'Cash flow is strong'] }),
    summary: json({ summary: 'Solid fundamentals with a rich valuation.' }),
    routing: json({ selected_agent: 'FundamentalsAgent', reasoning: 'Outlook depends on earnings.' }),
    evaluation: json({ overall_score: 0.9, feedback: ['Clear and complete'] }),
    reflection: json({
      overall_quality_score: 0.88,
      dimension_scores: { completeness: 0.9, data_quality: 0.85, analysis_depth: 0.8 },
      strengths: ['Broad data coverage', 'Consistent recommendations'],
      weaknesses: ['No peer comparison'],
      improvements: ['Add peer valuation multiples'],
    }),
  };
}

export function quoteFixture(overrides: DataRecord = {}): DataRecord {
  return {
    symbol: 'TEST',
    company_name: 'Test Corp',
    sector: 'Technology',
    current_price: 175.43,
    previous_close: 174.22,
    market_cap: 2750000000000,
    pe_ratio: 28.5,
    '52_week_high': 199.62,
    '52_week_low': 164.08,
    beta: 1.24,
    volume: 52000000,
    ...overrides,
  };
}

export function filingsFixture(): DataRecord {
  return {
    symbol: 'TEST',
    cik: '0000000001',
    company_name: 'Test Corp',
    filings: [
      { form: '10-Q', filing_date: '2024-05-03', accession_number: 'a-1', primary_document: 'q.htm' },
      { form: '8-K', filing_date: '2024-05-02', accession_number: 'a-2', primary_document: 'k.htm' },
    ],
  };
}

export interface FakeSourceOptions {
  quote?: DataRecord | Error;
  news?: DataRecord[] | Error;
  filings?: DataRecord | Error;
  overview?: DataRecord | null | Error;
  macro?: Record<string, DataRecord | null | Error>;
}

async function settle<T>(value: T | Error): Promise<T> {
  if (value instanceof Error) throw value;
  return value;
}

/** In-memory data source; optional capabilities exist only when their option is given */
export function fakeDataSource(options: FakeSourceOptions = {}): DataSourceClient {
  const source: DataSourceClient = {
    getPrimaryQuoteAndFundamentals: () => settle(options.quote ?? quoteFixture()),
    getRecentNews: () => settle(options.news ?? [{ title: 'Earnings beat' }]),
    getRegulatoryFilings: () => settle(options.filings ?? filingsFixture()),
  };

  const overview = options.overview;
  if (overview !== undefined) {
    source.fundamentals = { getFundamentalsOverview: () => settle(overview) };
  }

  const macro = options.macro;
  if (macro) {
    source.macro = {
      getMacroIndicator: seriesId => settle(macro[seriesId] ?? null),
    };
  }

  return source;
}
