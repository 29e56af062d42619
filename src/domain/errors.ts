/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the engine can report is described by a `TypedError`:
 * a namespaced code, a message, and structured details. Thrown errors
 * wrap a `TypedError` so callers at a boundary (the streaming bridge,
 * the HTTP error handler) can convert them without string matching.
 */

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and stream events. */
export interface TypedError {
  /** Namespaced error code (e.g., "NODE.TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated node if applicable. */
  nodeId?: string;
  /** Associated run if applicable. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  nodeId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    nodeId: params.nodeId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function emptyPromptError(): TypedError {
  return createTypedError({
    code: 'VALIDATION.EMPTY_PROMPT',
    message: 'No prompt was provided',
    retryable: false,
    suggestedFixes: [
      { type: 'ADD_FIELD', params: { field: 'prompt' }, description: 'Pass a non-empty "prompt" query parameter' },
    ],
  });
}

export function configError(key: string, value: string, expected: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.CONFIG',
    message: `Invalid configuration value for ${key}: "${value}" (expected ${expected})`,
    retryable: false,
    details: { key, value, expected },
  });
}

export function routingError(nodeId: string, outcome: string, knownOutcomes: string[], runId?: string): TypedError {
  return createTypedError({
    code: 'RUN.ROUTING',
    message: `Router on node "${nodeId}" produced outcome "${outcome}" with no routing table entry`,
    nodeId,
    runId,
    retryable: false,
    details: { outcome, knownOutcomes },
  });
}

export function nodeFailureError(nodeId: string, message: string, runId?: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'NODE.EXECUTION_ERROR',
    message: `Node "${nodeId}" failed: ${message}`,
    nodeId,
    runId,
    retryable: false,
    details,
  });
}

export function nodeTimeoutError(nodeId: string, timeoutMs: number, runId?: string): TypedError {
  return createTypedError({
    code: 'NODE.TIMEOUT',
    message: `Node "${nodeId}" exceeded timeout of ${timeoutMs}ms`,
    nodeId,
    runId,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function runCanceledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    runId,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

export function stepLimitError(runId: string, maxSteps: number): TypedError {
  return createTypedError({
    code: 'RUN.STEP_LIMIT',
    message: `Run exceeded the limit of ${maxSteps} node executions`,
    runId,
    retryable: false,
    details: { maxSteps },
  });
}

// --- Thrown error classes ---

/** Base class for every error the engine throws. Carries its typed form. */
export class WorkflowError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'WorkflowError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** A graph definition failed validation at build time. Fatal at startup. */
export class GraphValidationError extends WorkflowError {
  constructor(public readonly issues: TypedError[]) {
    super(
      createTypedError({
        code: 'GRAPH.VALIDATION',
        message: `Graph validation failed: ${issues.map((i) => i.message).join('; ')}`,
        retryable: false,
        details: { issues: issues.map((i) => i.code) },
      }),
    );
    this.name = 'GraphValidationError';
  }
}

/** A router produced an outcome missing from its table. */
export class RoutingError extends WorkflowError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'RoutingError';
  }
}

/** A node handler threw, timed out, or returned an update the state record rejects. */
export class NodeExecutionError extends WorkflowError {
  constructor(typedError: TypedError, public readonly originalError?: unknown) {
    super(typedError);
    this.name = 'NodeExecutionError';
  }
}

export class RunCanceledError extends WorkflowError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'RunCanceledError';
  }
}

export class StepLimitError extends WorkflowError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'StepLimitError';
  }
}

export class EmptyPromptError extends WorkflowError {
  constructor() {
    super(emptyPromptError());
    this.name = 'EmptyPromptError';
  }
}

export class ConfigError extends WorkflowError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ConfigError';
  }
}

/**
 * Convert any thrown value to a TypedError. Engine errors keep their
 * typed form; anything else becomes SYSTEM.INTERNAL.
 */
export function toTypedError(err: unknown): TypedError {
  if (err instanceof WorkflowError) return err.typedError;
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: errorMessage(err),
    retryable: false,
  });
}

/** Message of a thrown value, whatever was thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
