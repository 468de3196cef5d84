// Harness Errors
// Every failure surfaced to a caller is one of these, or a Node errno error passed through untouched

export type HarnessErrorCode =
  | 'NOT_FOUND'
  | 'DECODE_ERROR'
  | 'CONFIG_ERROR'
  | 'VALIDATION_ERROR'
  | 'CIRCUIT_OPEN'
  | 'ABORTED'
  | 'LLM_ERROR';

export class HarnessError extends Error {
  constructor(
    public readonly code: HarnessErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends HarnessError {
  constructor(public readonly path: string, message = `File not found: ${path}`) {
    super('NOT_FOUND', message);
  }
}

export class DecodeError extends HarnessError {
  constructor(public readonly path: string, cause: unknown) {
    super('DECODE_ERROR', `Invalid JSON in ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export class ValidationError extends HarnessError {
  constructor(message: string, public readonly errors: string[] = []) {
    super('VALIDATION_ERROR', errors.length > 0 ? `${message}: ${errors.join('; ')}` : message);
  }
}

export class CircuitBreakerOpenError extends HarnessError {
  constructor(
    public readonly stepKey: string,
    public readonly failureCount: number,
    cause?: unknown
  ) {
    super('CIRCUIT_OPEN', `Circuit breaker opened at step '${stepKey}' after ${failureCount} failures`, { cause });
  }
}

export class WorkflowAbortedError extends HarnessError {
  constructor(stepKey: string) {
    super('ABORTED', `Workflow aborted before step '${stepKey}'`);
  }
}

export enum LlmErrorKind {
  RATE_LIMIT = 'RATE_LIMIT',
  TIMEOUT = 'TIMEOUT',
  API = 'API',
}

export class LlmError extends HarnessError {
  constructor(
    public readonly kind: LlmErrorKind,
    public readonly detail: string,
    cause?: unknown
  ) {
    super('LLM_ERROR', `${kind}: ${detail}`, { cause });
  }
}

export function isLlmTimeout(error: unknown): error is LlmError {
  return error instanceof LlmError && error.kind === LlmErrorKind.TIMEOUT;
}

/**
 * Node errno code of a filesystem error, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
