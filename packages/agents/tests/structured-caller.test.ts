import { describe, it, expect } from 'vitest';
import {
  StructuredModelCaller, extractJsonObject, fallbackJson,
  JSON_DIRECTIVE, FALLBACK_RECOMMENDATION,
} from '../llm/structured-caller.js';
import {
  decode, RoutingSchema, EvaluationSchema, PlanSchema, ReflectionSchema, stringList,
} from '../llm/schemas.js';
import { ModelCallError, ModelOutputParseError } from '../utils/errors.js';
import type { ModelBackend, ModelRequest } from '../types/data-source.js';

function backendReturning(reply: string | Error): ModelBackend & { seen: ModelRequest[] } {
  const seen: ModelRequest[] = [];
  return {
    model: 'test-model',
    seen,
    async complete(request) {
      seen.push(request);
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
}

const request: ModelRequest = { system: 'You are a tester.', prompt: 'Go', temperature: 0.5, maxTokens: 100 };

describe('extractJsonObject', () => {
  it('parses a bare object', () => {
    expect(extractJsonObject('{"a": 1}')).toEqual({ a: 1 });
  });

  it('strips a json code fence', () => {
    expect(extractJsonObject('```json\n{"a": [1, 2]}\n```')).toEqual({ a: [1, 2] });
  });

  it('takes the slice between the first and last brace', () => {
    expect(extractJsonObject('Here you go: {"ok": true} hope it helps')).toEqual({ ok: true });
  });

  it('rejects arrays, scalars and broken JSON', () => {
    expect(extractJsonObject('[1, 2]')).toBeUndefined();
    expect(extractJsonObject('42')).toBeUndefined();
    expect(extractJsonObject('{"a": ')).toBeUndefined();
    expect(extractJsonObject('no json here')).toBeUndefined();
  });
});

describe('StructuredModelCaller', () => {
  it('appends the JSON directive to the system prompt', async () => {
    const backend = backendReturning('{"x": 1}');
    const caller = new StructuredModelCaller(backend);

    const response = await caller.call(request);

    expect(backend.seen[0].system).toBe(`You are a tester.\n\n${JSON_DIRECTIVE}`);
    expect(backend.seen[0].prompt).toBe('Go');
    expect(response).toEqual({ json: { x: 1 }, text: '{"x": 1}', source: 'model' });
  });

  it('wraps a non-JSON reply under the fallback policy', async () => {
    const caller = new StructuredModelCaller(backendReturning('Plain prose answer'));

    const response = await caller.call(request);

    expect(response.source).toBe('fallback');
    expect(response.json).toEqual({
      raw_analysis: 'Plain prose answer',
      recommendations: [FALLBACK_RECOMMENDATION],
    });
  });

  it('throws ModelOutputParseError under the throw policy', async () => {
    const caller = new StructuredModelCaller(backendReturning('not json'));

    const err = await caller.call(request, { onParseError: 'throw' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelOutputParseError);
    expect(err instanceof ModelOutputParseError && err.rawText).toBe('not json');
  });

  it('wraps backend failures as ModelCallError', async () => {
    const caller = new StructuredModelCaller(backendReturning(new Error('socket hang up')));

    await expect(caller.call(request)).rejects.toThrow(ModelCallError);
    await expect(caller.call(request)).rejects.toThrow('Model call failed: socket hang up');
  });

  it('passes ModelCallError through unchanged', async () => {
    const original = new ModelCallError('quota exceeded');
    const caller = new StructuredModelCaller(backendReturning(original));

    await expect(caller.call(request)).rejects.toBe(original);
  });

  it('exposes the backend model name', () => {
    expect(new StructuredModelCaller(backendReturning('{}')).model).toBe('test-model');
  });
});

describe('fallbackJson', () => {
  it('keeps the raw text', () => {
    expect(fallbackJson('abc').raw_analysis).toBe('abc');
  });
});

describe('decode', () => {
  it('returns typed values for a matching reply', () => {
    const decoded = decode(RoutingSchema, { selected_agent: ' MarketDataAgent ', reasoning: 'Price driven' });
    expect(decoded).toEqual({
      kind: 'typed',
      value: { selected_agent: 'MarketDataAgent', reasoning: 'Price driven' },
    });
  });

  it('returns the raw object when a required field is missing', () => {
    const decoded = decode(RoutingSchema, { reasoning: 'no agent' });
    expect(decoded).toEqual({ kind: 'raw', value: { reasoning: 'no agent' } });
  });

  it('defaults a wrong-typed reasoning', () => {
    const decoded = decode(RoutingSchema, { selected_agent: 'RegulatoryAgent', reasoning: 7 });
    expect(decoded.kind === 'typed' && decoded.value.reasoning).toBe('Agent selected');
  });

  it('coerces and bounds evaluation scores', () => {
    const numeric = decode(EvaluationSchema, { overall_score: '0.6', feedback: 'Tighten the summary' });
    expect(numeric.kind === 'typed' && numeric.value.overall_score).toBe(0.6);
    expect(numeric.kind === 'typed' && numeric.value.feedback).toEqual(['Tighten the summary']);

    const outOfRange = decode(EvaluationSchema, { overall_score: 3 });
    expect(outOfRange.kind === 'typed' && outOfRange.value.overall_score).toBe(0.75);
  });

  it('does not read null, booleans or blank strings as scores', () => {
    for (const overall_score of [null, true, '', '  ']) {
      const decoded = decode(EvaluationSchema, { overall_score });
      expect(decoded.kind === 'typed' && decoded.value.overall_score).toBe(0.75);
    }
  });

  it('returns the raw reflection when its overall score is unusable', () => {
    expect(decode(ReflectionSchema, { overall_quality_score: null }).kind).toBe('raw');
    expect(decode(ReflectionSchema, { overall_quality_score: true }).kind).toBe('raw');

    const decoded = decode(ReflectionSchema, {
      overall_quality_score: '0.7',
      dimension_scores: { completeness: null, data_quality: 0.6 },
    });
    expect(decoded.kind === 'typed' && decoded.value.overall_quality_score).toBe(0.7);
    expect(decoded.kind === 'typed' && decoded.value.dimension_scores).toEqual({ completeness: undefined, data_quality: 0.6 });
  });

  it('fills every plan field with a default', () => {
    const decoded = decode(PlanSchema, { objectives: ['One', 2, 'Three'] });
    expect(decoded).toEqual({
      kind: 'typed',
      value: {
        objectives: ['One', 'Three'],
        data_sources: [],
        analysis_steps: [],
        expected_outputs: [],
        reasoning: '',
      },
    });
  });

  it('stringList turns other values into an empty list', () => {
    expect(stringList().parse({ a: 1 })).toEqual([]);
    expect(stringList().parse(undefined)).toEqual([]);
  });
});
