// Regulatory specialist — rule-based summary of recent SEC filings, no model call

import { z } from 'zod';
import type { AnalysisResult, DataRecord } from '../types/research.js';
import { BaseAnalyst } from './base-analyst.js';

const TYPE_WINDOW = 10;

export const STANDING_RECOMMENDATIONS: readonly string[] = [
  'Review the latest 10-K and 10-Q for material changes',
  'Monitor 8-K filings for material events',
];

const FilingSchema = z.object({
  form: z.string().catch(''),
  filing_date: z.string().catch(''),
}).passthrough();

const FilingsPayloadSchema = z.object({
  filings: z.array(z.unknown()).catch([]).default([]),
  error: z.string().optional().catch(undefined),
}).passthrough();

export class RegulatoryAnalyst extends BaseAnalyst {
  constructor() {
    super('regulatory');
  }

  async analyze(symbol: string, payload: DataRecord): Promise<AnalysisResult> {
    const parsed = FilingsPayloadSchema.parse(payload);
    const filings = parsed.filings.flatMap(item => {
      const filing = FilingSchema.safeParse(item);
      return filing.success ? [filing.data] : [];
    });

    const recentTypes: string[] = [];
    for (const filing of filings.slice(0, TYPE_WINDOW)) {
      if (filing.form && !recentTypes.includes(filing.form)) recentTypes.push(filing.form);
    }

    const mostRecent = filings[0] ?? null;
    const status = filings.length > 0 ? 'Current' : 'Unknown';

    const findings: DataRecord = {
      compliance_status: status,
      total_recent_filings: filings.length,
      recent_filing_types: recentTypes,
      most_recent_filing: mostRecent,
    };
    if (parsed.error) findings.error = parsed.error;

    const recommendations = [...STANDING_RECOMMENDATIONS];
    if (mostRecent) {
      recommendations.unshift(`Latest filing: ${mostRecent.form} filed on ${mostRecent.filing_date}`);
    }

    const reasoning = parsed.error
      ? `Filings for ${symbol} could not be retrieved (${parsed.error}); compliance status is Unknown.`
      : `${filings.length} recent filing(s) found for ${symbol}; compliance status is ${status}.`;

    this.log.info(`Compliance status for ${symbol}: ${status}`);
    return this.buildResult(findings, recommendations, reasoning);
  }
}
