// Structured model caller — one round trip that must yield a single JSON object

import type { DataRecord } from '../types/research.js';
import type { ModelBackend, ModelRequest } from '../types/data-source.js';
import { ModelCallError, ModelOutputParseError, errorMessage } from '../utils/errors.js';

export const JSON_DIRECTIVE = 'Respond with exactly one JSON object and no other text.';

export const FALLBACK_RECOMMENDATION = 'Review raw analysis for insights';

export type ParseErrorPolicy = 'fallback' | 'throw';

export interface CallOptions {
  onParseError: ParseErrorPolicy;
}

export interface StructuredResponse {
  json: DataRecord;
  text: string;
  source: 'model' | 'fallback';
}

export function isPlainObject(value: unknown): value is DataRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const FENCE = /^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/;

/**
 * Pull the JSON object out of a model reply. Returns undefined when the
 * reply holds no parseable object.
 */
export function extractJsonObject(text: string): DataRecord | undefined {
  let body = text.trim();
  const fenced = FENCE.exec(body);
  if (fenced) body = fenced[1];

  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;

  try {
    const parsed: unknown = JSON.parse(body.slice(start, end + 1));
    return isPlainObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/** Stand-in findings when the reply is not JSON */
export function fallbackJson(text: string): DataRecord {
  return {
    raw_analysis: text,
    recommendations: [FALLBACK_RECOMMENDATION],
  };
}

export class StructuredModelCaller {
  constructor(private readonly backend: ModelBackend) {}

  get model(): string {
    return this.backend.model;
  }

  async call(
    request: ModelRequest,
    options: CallOptions = { onParseError: 'fallback' },
  ): Promise<StructuredResponse> {
    let text: string;
    try {
      text = await this.backend.complete({
        ...request,
        system: `${request.system}\n\n${JSON_DIRECTIVE}`,
      });
    } catch (err) {
      if (err instanceof ModelCallError) throw err;
      throw new ModelCallError(`Model call failed: ${errorMessage(err)}`, { cause: err });
    }

    const json = extractJsonObject(text);
    if (json) return { json, text, source: 'model' };

    if (options.onParseError === 'throw') {
      throw new ModelOutputParseError('Model reply did not contain a JSON object', text);
    }
    return { json: fallbackJson(text), text, source: 'fallback' };
  }
}
