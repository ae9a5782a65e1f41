// src/errors.ts

/**
 * Error taxonomy of the advisory engine. Everything except
 * ConfigurationError is recovered per request into a degraded response.
 */
export class AdvisorError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public hint?: string,
    public meta?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AdvisorError';
  }
}

export const ERROR_HINTS = {
  CLASSIFICATION_FAILED: 'Router could not classify the query; falling back to the generalist agent',
  RETRIEVAL_FAILED: 'Retrieval backend unreachable; answering from the remaining source or the model alone',
  MODEL_FAILED: 'Model provider failed or timed out after one retry',
  PERSISTENCE_FAILED: 'Conversation store unavailable; turn kept in memory only',
  CONFIGURATION_ERROR: 'Set the missing environment variable and restart the server',
  WORKFLOW_ABORTED: 'Client disconnected before the answer was ready',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

export class ClassificationFailure extends AdvisorError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super('CLASSIFICATION_FAILED', message, ERROR_HINTS.CLASSIFICATION_FAILED, meta);
    this.name = 'ClassificationFailure';
  }
}

export class RetrievalFailure extends AdvisorError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super('RETRIEVAL_FAILED', message, ERROR_HINTS.RETRIEVAL_FAILED, meta);
    this.name = 'RetrievalFailure';
  }
}

export class ModelFailure extends AdvisorError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super('MODEL_FAILED', message, ERROR_HINTS.MODEL_FAILED, meta);
    this.name = 'ModelFailure';
  }
}

export class PersistenceFailure extends AdvisorError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super('PERSISTENCE_FAILED', message, ERROR_HINTS.PERSISTENCE_FAILED, meta);
    this.name = 'PersistenceFailure';
  }
}

export class ConfigurationError extends AdvisorError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, ERROR_HINTS.CONFIGURATION_ERROR, meta);
    this.name = 'ConfigurationError';
  }
}

export class WorkflowAborted extends AdvisorError {
  constructor(message = 'Workflow aborted', meta?: Record<string, unknown>) {
    super('WORKFLOW_ABORTED', message, ERROR_HINTS.WORKFLOW_ABORTED, meta);
    this.name = 'WorkflowAborted';
  }
}

export function isAdvisorError(error: unknown): error is AdvisorError {
  return error instanceof AdvisorError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps an unknown thrown value into the given failure class.
 */
export function wrapError<T extends AdvisorError>(
  error: unknown,
  Failure: new (message: string, meta?: Record<string, unknown>) => T,
): T | AdvisorError {
  if (isAdvisorError(error)) {
    return error;
  }
  return new Failure(errorMessage(error), { originalError: error });
}
