export enum ErrorCode {
  EMBEDDING_FAILURE = 'EMBEDDING_FAILURE',
  TOOL_EXECUTION = 'TOOL_EXECUTION',
  INVALID_ARGS = 'INVALID_ARGS',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  GENERATION_BACKEND_UNAVAILABLE = 'GENERATION_BACKEND_UNAVAILABLE',
  CATALOG_VALIDATION = 'CATALOG_VALIDATION',
  CONFIG = 'CONFIG',
}

export class CatalogAssistantError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;

  constructor(code: ErrorCode, message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export type EmbeddingFailureReason = 'empty' | 'oversized' | 'corrupt' | 'backend';

export class EmbeddingFailure extends CatalogAssistantError {
  public readonly reason: EmbeddingFailureReason;

  constructor(reason: EmbeddingFailureReason, message: string, options?: { cause?: unknown }) {
    super(ErrorCode.EMBEDDING_FAILURE, `embedding failed (${reason}): ${message}`, 502, options);
    this.reason = reason;
  }
}

export class ToolExecutionError extends CatalogAssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.TOOL_EXECUTION, message, 500, options);
  }
}

export class InvalidArgsError extends CatalogAssistantError {
  constructor(message: string) {
    super(ErrorCode.INVALID_ARGS, message, 400);
  }
}

export class NotFoundError extends CatalogAssistantError {
  constructor(message: string) {
    super(ErrorCode.NOT_FOUND, message, 404);
  }
}

export class UnauthorizedError extends CatalogAssistantError {
  constructor(message = 'missing user identity') {
    super(ErrorCode.UNAUTHORIZED, message, 401);
  }
}

export class GenerationBackendUnavailable extends CatalogAssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.GENERATION_BACKEND_UNAVAILABLE, message, 503, options);
  }
}

/** Raised by the catalog writer when a record breaks a data-model invariant. */
export class CatalogValidationError extends CatalogAssistantError {
  constructor(message: string) {
    super(ErrorCode.CATALOG_VALIDATION, message, 400);
  }
}

export class ConfigError extends CatalogAssistantError {
  constructor(message: string) {
    super(ErrorCode.CONFIG, message, 500);
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'APIUserAbortError');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
