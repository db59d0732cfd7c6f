// Error taxonomy for the research core

export class ResearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResearchError';
  }
}

/** Transport or backend failure of a model call (auth, timeout, quota, network) */
export class ModelCallError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModelCallError';
  }
}

/** Model replied, but not with a JSON object */
export class ModelOutputParseError extends ResearchError {
  constructor(message: string, public readonly rawText: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModelOutputParseError';
  }
}

export class ValidationError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

export class DataSourceError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataSourceError';
  }
}

export class ConfigError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
