// Response decoders — one zod schema per prompt
// Wrong-typed optional fields fall back to defaults; only required fields fail a decode

import { z } from 'zod';
import type { DataRecord } from '../types/research.js';

export type Decoded<T> =
  | { kind: 'typed'; value: T }
  | { kind: 'raw'; value: DataRecord };

export function decode<S extends z.ZodTypeAny>(schema: S, json: DataRecord): Decoded<z.output<S>> {
  const parsed = schema.safeParse(json);
  return parsed.success
    ? { kind: 'typed', value: parsed.data }
    : { kind: 'raw', value: json };
}

/** List of strings; non-string entries are dropped, a lone string becomes a one-item list */
export const stringList = () =>
  z.union([
    z.array(z.unknown()).transform(items => items.filter((item): item is string => typeof item === 'string')),
    z.string().transform(s => [s]),
  ]).catch([]);

// Numbers and numeric strings only; null, booleans and blank strings do not count as a score
const score = z.preprocess(
  v => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
  z.number().finite().min(0).max(1),
);

export const PlanSchema = z.object({
  objectives: stringList(),
  data_sources: stringList(),
  analysis_steps: stringList(),
  expected_outputs: stringList(),
  reasoning: z.string().catch(''),
});

export const InsightsSchema = z.object({
  insights: stringList(),
});

export const SummarySchema = z.object({
  summary: z.string().trim().catch(''),
});

export const RoutingSchema = z.object({
  selected_agent: z.string().trim().min(1),
  reasoning: z.string().catch('Agent selected'),
});

export const EvaluationSchema = z.object({
  overall_score: score.catch(0.75),
  completeness: score.optional().catch(undefined),
  clarity: score.optional().catch(undefined),
  actionability: score.optional().catch(undefined),
  feedback: stringList(),
});

export const ReflectionSchema = z.object({
  overall_quality_score: score,
  dimension_scores: z.object({
    completeness: score.optional().catch(undefined),
    data_quality: score.optional().catch(undefined),
    analysis_depth: score.optional().catch(undefined),
    actionability: score.optional().catch(undefined),
  }).catch({}),
  strengths: stringList(),
  weaknesses: stringList(),
  improvements: stringList(),
});

export type PlanPayload = z.output<typeof PlanSchema>;
export type EvaluationPayload = z.output<typeof EvaluationSchema>;
export type ReflectionPayload = z.output<typeof ReflectionSchema>;
