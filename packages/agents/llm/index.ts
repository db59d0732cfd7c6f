export { StructuredModelCaller, extractJsonObject, fallbackJson, isPlainObject, JSON_DIRECTIVE, FALLBACK_RECOMMENDATION } from './structured-caller.js';
export type { CallOptions, ParseErrorPolicy, StructuredResponse } from './structured-caller.js';
export { AnthropicBackend } from './anthropic-backend.js';
export type { AnthropicBackendOptions, MessagesClient } from './anthropic-backend.js';
export * from './schemas.js';
