/**
 * Error taxonomy for a formatting run
 * Every failure that aborts the pipeline is one of these
 */

export type PipelineStep = 'context' | 'config' | 'checkout' | 'format' | 'commit' | 'state';

/**
 * Base class for all pipeline failures
 */
export class PipelineError extends Error {
  readonly step: PipelineStep;

  constructor(step: PipelineStep, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.step = step;
  }
}

// Event is not one we handle, or its payload is missing fields
export class ContextError extends PipelineError {
  constructor(message: string) {
    super('context', message);
    this.name = 'ContextError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

// Ref could not be resolved or fetched
export class CheckoutError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('checkout', message, options);
    this.name = 'CheckoutError';
  }
}

// Black could not run or could not parse the input
export class FormatterError extends PipelineError {
  readonly exitCode?: number;

  constructor(message: string, exitCode?: number, options?: { cause?: unknown }) {
    super('format', message, options);
    this.name = 'FormatterError';
    this.exitCode = exitCode;
  }
}

// Permission denied or conflicting remote history
export class CommitError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('commit', message, options);
    this.name = 'CommitError';
  }
}

export class PipelineStateError extends PipelineError {
  constructor(message: string) {
    super('state', message);
    this.name = 'PipelineStateError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
