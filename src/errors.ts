// Error taxonomy for a generation run. Every one of these aborts the run.

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class GenerationError extends Error {
  constructor(message: string, public filename?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export class ScopeResolutionError extends GenerationError {
  constructor(message: string, filename?: string, options?: { cause?: unknown }) {
    super(message, filename, options);
    this.name = 'ScopeResolutionError';
  }
}

export class ImportResolutionError extends GenerationError {
  constructor(message: string, filename?: string, options?: { cause?: unknown }) {
    super(message, filename, options);
    this.name = 'ImportResolutionError';
  }
}

export class TypeClassificationError extends GenerationError {
  constructor(message: string, filename?: string, options?: { cause?: unknown }) {
    super(message, filename, options);
    this.name = 'TypeClassificationError';
  }
}

export class RenderError extends GenerationError {
  constructor(message: string, filename?: string, options?: { cause?: unknown }) {
    super(message, filename, options);
    this.name = 'RenderError';
  }
}

export class SourceReadError extends GenerationError {
  constructor(message: string, filename?: string, options?: { cause?: unknown }) {
    super(message, filename, options);
    this.name = 'SourceReadError';
  }
}

// Two output units of one run resolved to the same path
export class OutputConflictError extends GenerationError {
  constructor(message: string, filename?: string, options?: { cause?: unknown }) {
    super(message, filename, options);
    this.name = 'OutputConflictError';
  }
}

// A JSON patch request failed validation or could not be linked
export class RequestError extends Error {
  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = 'RequestError';
  }
}
