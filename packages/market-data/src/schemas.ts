import { z } from 'zod';

// Provider response envelopes. Only the outer shape is enforced; field-level
// values are read leniently by the clients since providers omit fields freely.

const LooseRecord = z.record(z.unknown());

export const YahooQuoteSummarySchema = z.object({
  quoteSummary: z.object({
    result: z.array(LooseRecord).nullable().default([]),
    error: z.unknown().optional(),
  }),
});

export const YahooSearchSchema = z.object({
  news: z.array(LooseRecord).default([]),
});

export const AlphaVantageOverviewSchema = LooseRecord;

export const FredObservationsSchema = z.object({
  observations: z.array(z.object({
    date: z.string(),
    value: z.string(),
  }).passthrough()).default([]),
});

export const SecTickerMapSchema = z.record(z.object({
  cik_str: z.union([z.number(), z.string()]),
  ticker: z.string(),
  title: z.string(),
}));

export const SecSubmissionsSchema = z.object({
  cik: z.union([z.number(), z.string()]).optional(),
  name: z.string().optional(),
  filings: z.object({
    recent: z.object({
      form: z.array(z.string()).default([]),
      filingDate: z.array(z.string()).default([]),
      accessionNumber: z.array(z.string()).default([]),
      primaryDocument: z.array(z.string()).default([]),
    }),
  }),
});

export const SymbolSchema = z.string().trim().min(1).max(10).transform(s => s.toUpperCase());
