/**
 * Typed failures of the assistant pipeline.
 *
 * Every error carries a stable `code`, whether a local retry may help (`retryable`)
 * and the pipeline stage it belongs to, so degradations can be attributed.
 */
import type { ZodIssue } from 'zod';

export type FailureStage =
  | 'guard'
  | 'classify'
  | 'rewrite'
  | 'retrieve'
  | 'grade'
  | 'plan'
  | 'tool'
  | 'generate'
  | 'direct'
  | 'memory'
  | 'request';

export class AssistantError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly retryable: boolean,
    readonly stage: FailureStage,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input rejected before any external call. Never retried. */
export class ValidationError extends AssistantError {
  constructor(
    message: string,
    readonly issues: Array<{ path: string; message: string }> = [],
    stage: FailureStage = 'request',
  ) {
    super(message, 'VALIDATION_ERROR', false, stage);
  }

  static fromZod(context: string, issues: ZodIssue[], stage: FailureStage = 'request'): ValidationError {
    const mapped = issues.map((issue) => ({ path: issue.path.join('.') || '(root)', message: issue.message }));
    const summary = mapped.map((i) => `${i.path}: ${i.message}`).join('; ');
    return new ValidationError(`${context}: ${summary}`, mapped, stage);
  }
}

export class RetrievalError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RETRIEVAL_ERROR', true, 'retrieve', options);
  }
}

export class ToolInvocationError extends AssistantError {
  constructor(
    message: string,
    readonly toolName: string,
    retryable: boolean,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, 'TOOL_INVOCATION_ERROR', retryable, 'tool', options);
  }
}

export class GenerationError extends AssistantError {
  constructor(message: string, stage: FailureStage = 'generate', options?: { cause?: unknown }) {
    super(message, 'GENERATION_ERROR', true, stage, options);
  }
}

export class RoutingAmbiguityError extends AssistantError {
  constructor(message: string) {
    super(message, 'ROUTING_AMBIGUITY', false, 'classify');
  }
}

/** The caller went away; the turn is abandoned without side effects. */
export class TurnCancelledError extends AssistantError {
  constructor(stage: FailureStage = 'request') {
    super('Turn cancelled', 'TURN_CANCELLED', false, stage);
  }
}

/** A step that owns a timeout gave up waiting. Retryable. */
export class TimeoutError extends AssistantError {
  constructor(label: string, timeoutMs: number, stage: FailureStage) {
    super(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT', true, stage);
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof AssistantError && error.retryable;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Throws TurnCancelledError when the turn's signal has fired. */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: FailureStage = 'request'): void {
  if (signal?.aborted) throw new TurnCancelledError(stage);
}
