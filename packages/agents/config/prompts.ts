// Prompt templates and sampling settings for every structured model call

import type { DataRecord } from '../types/research.js';
import type { PriceMetrics } from '../utils/derived-metrics.js';
import { fmt, fmtInteger, fmtMoney, fmtPercent, fmtSignedPercent } from '../utils/format.js';

export interface CallSettings {
  readonly temperature: number;
  readonly maxTokens: number;
}

export const CALL_SETTINGS = {
  plan: { temperature: 0.7, maxTokens: 800 },
  market: { temperature: 0.7, maxTokens: 500 },
  fundamentals: { temperature: 0.7, maxTokens: 500 },
  economic: { temperature: 0.7, maxTokens: 500 },
  insights: { temperature: 0.7, maxTokens: 300 },
  summary: { temperature: 0.7, maxTokens: 200 },
  routing: { temperature: 0.3, maxTokens: 150 },
  evaluation: { temperature: 0.5, maxTokens: 300 },
  reflection: { temperature: 0.5, maxTokens: 600 },
} as const satisfies Record<string, CallSettings>;

export const SYSTEM_PROMPTS = {
  plan: 'You are an expert financial research planner. Create detailed, actionable research plans.',
  market: 'You are an expert market analyst.',
  fundamentals: 'You are an expert fundamental analyst.',
  economic: 'You are an expert macroeconomic analyst.',
  insights: 'You are a financial analyst extracting key insights.',
  summary: 'You are a financial analyst creating executive summaries.',
  routing: 'You are a query routing expert.',
  evaluation: 'You are a quality assurance expert for financial analysis.',
  reflection: 'You are a research quality reviewer assessing a completed investment research cycle.',
} as const;

// ── Planning ──────────────────────────────────────────────────────────

export function planPrompt(symbol: string): string {
  return `Create a comprehensive research plan for analyzing ${symbol} stock.

Return JSON with these fields:
{
  "objectives": ["5 clear, specific objectives"],
  "data_sources": ["data sources, e.g. Yahoo Finance - real-time stock data, Alpha Vantage - company fundamentals, FRED - economic indicators, SEC EDGAR - regulatory filings"],
  "analysis_steps": ["ordered steps from data collection to recommendation and quality assessment"],
  "expected_outputs": ["deliverables, e.g. market trend analysis, fundamental health assessment, investment recommendation with rationale"],
  "reasoning": "2-3 sentences on why this plan suits ${symbol}, considering its sector, market cap and typical investor interest"
}

Be specific and actionable. Focus on what makes ${symbol} analysis unique.`;
}

// ── Specialist agents ─────────────────────────────────────────────────

export function marketPrompt(symbol: string, quote: DataRecord, metrics: PriceMetrics): string {
  return `Analyze this stock's market data and provide investment insights.

STOCK INFORMATION:
Symbol: ${symbol}
Company: ${fmt(quote.company_name)}
Sector: ${fmt(quote.sector)}

PRICE METRICS:
Current Price: ${fmtMoney(quote.current_price)}
Previous Close: ${fmtMoney(quote.previous_close)}
Price Change: ${fmtMoney(metrics.price_change)} (${fmtSignedPercent(metrics.price_change_percent)})
52-Week High: ${fmtMoney(quote['52_week_high'])}
52-Week Low: ${fmtMoney(quote['52_week_low'])}
52-Week Range Position: ${fmtPercent(metrics.range_position)}

VALUATION & RISK:
Market Cap: ${fmtInteger(quote.market_cap)}
PE Ratio: ${fmt(quote.pe_ratio)}
Beta (Volatility): ${fmt(quote.beta)}
Volume: ${fmtInteger(quote.volume)}

Provide your analysis in JSON with these fields:
{
  "price_trend": "bullish/bearish/neutral with 2-3 sentence explanation",
  "volatility_assessment": "high/moderate/low with reasoning based on beta and price action",
  "valuation_opinion": "overvalued/undervalued/fairly valued with reasoning based on PE and market position",
  "technical_position": "analysis of 52-week range position and recent price action",
  "key_observations": ["observation 1", "observation 2", "observation 3"],
  "recommendations": ["specific recommendation 1", "specific recommendation 2", "specific recommendation 3"]
}

Be specific, data-driven, and actionable. Focus on the metrics provided.`;
}

export function fundamentalsPrompt(symbol: string, data: DataRecord): string {
  return `Analyze the fundamentals of ${symbol} and assess its financial health.

COMPANY:
Company: ${fmt(data.company_name ?? data.name)}
Sector: ${fmt(data.sector)}

PROFITABILITY:
Profit Margin: ${fmt(data.profit_margin)}
Operating Margin: ${fmt(data.operating_margin)}
Return on Equity: ${fmt(data.return_on_equity)}
EBITDA: ${fmtInteger(data.ebitda)}

GROWTH:
Revenue: ${fmtInteger(data.revenue)}
Revenue Growth: ${fmt(data.revenue_growth ?? data.quarterly_revenue_growth)}
Earnings Growth: ${fmt(data.earnings_growth ?? data.quarterly_earnings_growth)}

BALANCE SHEET & VALUATION:
Debt to Equity: ${fmt(data.debt_to_equity)}
Forward PE: ${fmt(data.forward_pe)}
EPS: ${fmt(data.eps)}
Book Value: ${fmt(data.book_value)}
Dividend Yield: ${fmt(data.dividend_yield)}
Analyst Target Price: ${fmt(data.analyst_target_price)}

Provide your analysis in JSON with these fields:
{
  "profitability_assessment": "strong/adequate/weak with reasoning based on margins and returns",
  "growth_assessment": "assessment of revenue and earnings growth",
  "financial_health": "assessment of leverage and balance sheet strength",
  "valuation_assessment": "assessment of valuation against earnings and book value",
  "key_strengths": ["strength 1", "strength 2"],
  "key_concerns": ["concern 1", "concern 2"],
  "recommendations": ["specific recommendation 1", "specific recommendation 2"]
}

Be specific and ground every statement in the figures above.`;
}

export function economicPrompt(sector: string, data: DataRecord): string {
  return `Assess the macroeconomic context for the ${sector} sector${data.symbol ? ` (company: ${fmt(data.symbol)})` : ''}.

ECONOMIC INDICATORS:
Federal Funds Rate: ${fmt(data.fed_funds_rate)}
Unemployment Rate: ${fmt(data.unemployment_rate)}

Provide your analysis in JSON with these fields:
{
  "interest_rate_impact": "how the current rate environment affects the sector",
  "employment_impact": "how labour market conditions affect demand in the sector",
  "inflation_impact": "expected effect of inflation on costs and pricing power",
  "sector_outlook": "positive/neutral/negative with 2-3 sentence explanation",
  "key_risks": ["risk 1", "risk 2"],
  "recommendations": ["specific recommendation 1", "specific recommendation 2"]
}`;
}

// ── Prompt chain ──────────────────────────────────────────────────────

export function insightsPrompt(symbol: string, categories: DataRecord, data: unknown): string {
  const excerpt = JSON.stringify(data ?? {}).slice(0, 1500);
  return `Based on financial analysis of ${symbol}, extract 3-5 key investment insights.

Data categories: ${JSON.stringify(categories)}
Data: ${excerpt}

Focus on:
- Market positioning and trends
- Financial health indicators
- Investment opportunities or risks

Return JSON: {"insights": ["insight 1", "insight 2", "insight 3"]}

Be specific and actionable.`;
}

export function summaryPrompt(symbol: string, insights: readonly string[]): string {
  const list = insights.map(insight => `- ${insight}`).join('\n');
  return `Synthesize these investment insights for ${symbol} into a concise executive summary (2-3 sentences):

${list}

Return JSON: {"summary": "your executive summary here"}`;
}

// ── Routing ───────────────────────────────────────────────────────────

export function routingPrompt(query: string, agentsInfo: string): string {
  return `Route this financial analysis query to the most appropriate specialist agent:

Query: "${query}"

Available agents:
${agentsInfo}

Select ONE agent and return JSON:
{
  "selected_agent": "AgentName",
  "reasoning": "brief explanation why this agent is most suitable"
}`;
}

// ── Evaluation ────────────────────────────────────────────────────────

export function evaluationPrompt(analysisExcerpt: string): string {
  return `Evaluate the quality of this financial analysis:

${analysisExcerpt}

Rate on a scale of 0.0 to 1.0 and return JSON:
{
  "overall_score": 0.85,
  "completeness": 0.9,
  "clarity": 0.8,
  "actionability": 0.85,
  "feedback": ["specific feedback point 1", "point 2"]
}`;
}

// ── Reflection ────────────────────────────────────────────────────────

export function reflectionPrompt(symbol: string, cycleSummary: string): string {
  return `Review the research cycle just completed for ${symbol}:

${cycleSummary}

Assess the quality of the research and return JSON:
{
  "overall_quality_score": 0.0-1.0,
  "dimension_scores": {
    "completeness": 0.0-1.0,
    "data_quality": 0.0-1.0,
    "analysis_depth": 0.0-1.0,
    "actionability": 0.0-1.0
  },
  "strengths": ["what went well"],
  "weaknesses": ["what was missing or weak"],
  "improvements": ["concrete improvement for the next cycle"]
}`;
}
