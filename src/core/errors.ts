/**
 * Error Classes for knowledge-router
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIGURATION_ERROR = "E1000",
  CONFIG_GRAMMAR_INVALID = "E1001",
  CONFIG_VALUE_INVALID = "E1002",

  // Retrieval errors (2xxx)
  INVALID_TENANT = "E2000",
  NO_RETRIEVER_CONFIGURED = "E2001",
  RETRIEVER_NOT_FOUND = "E2002",
  RETRIEVAL_FAILED = "E2003",
  INVALID_RETRIEVAL_PLAN = "E2004",

  // Graph errors (3xxx)
  GRAPH_CONNECTION_FAILED = "E3000",
  GRAPH_QUERY_FAILED = "E3001",

  // Vector / embedding errors (4xxx)
  VECTOR_CONNECTION_FAILED = "E4000",
  VECTOR_SEARCH_FAILED = "E4001",
  VECTOR_UPSERT_FAILED = "E4002",
  EMBEDDING_FAILED = "E4003",

  // Code source registry errors (5xxx)
  SOURCE_NOT_FOUND = "E5000",
  REGISTRY_PERSIST_FAILED = "E5001",

  // Code graph build errors (6xxx)
  BUILD_FAILED = "E6000",
  COMMAND_TIMEOUT = "E6001",
  COMMAND_FAILED = "E6002",
  EXECUTABLE_NOT_FOUND = "E6003",
  OPERATION_CANCELLED = "E6004",

  // Ingestion errors (7xxx)
  INGESTION_FAILED = "E7000",
  DOCUMENT_SOURCE_NOT_FOUND = "E7001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  FILE_SYSTEM_ERROR = "E9002",
  EXTERNAL_UNAVAILABLE = "E9003",
}

/**
 * Base error class for all knowledge-router errors
 */
export class KnowledgeRouterError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "KnowledgeRouterError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Configuration loading and source-config grammar errors
 */
export class ConfigurationError extends KnowledgeRouterError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIGURATION_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Raised before dispatch when the business area is not configured
 */
export class InvalidTenantError extends KnowledgeRouterError {
  public readonly businessArea: string;

  constructor(businessArea: string, knownAreas: readonly string[] = []) {
    super(`Invalid business area: '${businessArea}'`, ErrorCode.INVALID_TENANT, {
      businessArea,
      knownAreas,
    });
    this.name = "InvalidTenantError";
    this.businessArea = businessArea;
  }
}

/**
 * Per-source retrieval errors. These never escape the dispatcher; they are
 * recorded in the RetrievalResult for the affected slot.
 */
export class RetrieverError extends KnowledgeRouterError {
  public readonly sourceName?: string;
  public readonly retrieverName?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RETRIEVAL_FAILED,
    context?: Record<string, unknown> & { sourceName?: string; retrieverName?: string }
  ) {
    super(message, code, context);
    this.name = "RetrieverError";
    this.sourceName = context?.sourceName;
    this.retrieverName = context?.retrieverName;
  }
}

/**
 * Registry operation on an unknown source id
 */
export class SourceNotFoundError extends KnowledgeRouterError {
  public readonly sourceId: string;

  constructor(sourceId: string) {
    super(`Source not found: ${sourceId}`, ErrorCode.SOURCE_NOT_FOUND, { sourceId });
    this.name = "SourceNotFoundError";
    this.sourceId = sourceId;
  }
}

/**
 * Code database build failure for a single (source, language)
 */
export class BuildError extends KnowledgeRouterError {
  public readonly sourceId?: string;
  public readonly language?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.BUILD_FAILED,
    context?: Record<string, unknown> & { sourceId?: string; language?: string }
  ) {
    super(message, code, context);
    this.name = "BuildError";
    this.sourceId = context?.sourceId;
    this.language = context?.language;
  }
}

/**
 * External process exceeded its time budget and was killed
 */
export class CommandTimeoutError extends KnowledgeRouterError {
  public readonly command: string;
  public readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`, ErrorCode.COMMAND_TIMEOUT, {
      command,
      timeoutMs,
    });
    this.name = "CommandTimeoutError";
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * External process exited with a non-zero status
 */
export class CommandFailedError extends KnowledgeRouterError {
  public readonly command: string;
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    super(
      `Command failed (exit ${exitCode ?? "signal"}): ${command}${stderr ? `: ${stderr}` : ""}`,
      ErrorCode.COMMAND_FAILED,
      { command, exitCode, stderr }
    );
    this.name = "CommandFailedError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Cooperative cancellation observed between pipeline phases
 */
export class CancelledError extends KnowledgeRouterError {
  constructor(reason?: string) {
    super(reason ?? "Operation cancelled", ErrorCode.OPERATION_CANCELLED);
    this.name = "CancelledError";
  }
}

/**
 * Graph / vector store or embedding backend unreachable
 */
export class ExternalUnavailableError extends KnowledgeRouterError {
  public readonly service: string;

  constructor(
    service: string,
    message: string,
    code: ErrorCode = ErrorCode.EXTERNAL_UNAVAILABLE,
    context?: Record<string, unknown>
  ) {
    super(message, code, { service, ...context });
    this.name = "ExternalUnavailableError";
    this.service = service;
  }
}

/**
 * Ingestion cycle failures
 */
export class IngestionError extends KnowledgeRouterError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INGESTION_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "IngestionError";
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Check if an error is a KnowledgeRouterError
 */
export function isKnowledgeRouterError(error: unknown): error is KnowledgeRouterError {
  return error instanceof KnowledgeRouterError;
}

/**
 * Wrap an unknown error in a KnowledgeRouterError
 */
export function wrapError(
  error: unknown,
  message?: string,
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): KnowledgeRouterError {
  if (isKnowledgeRouterError(error)) {
    return error;
  }

  const originalMessage = error instanceof Error ? error.message : String(error);
  const wrappedMessage = message ? `${message}: ${originalMessage}` : originalMessage;

  const wrapped = new KnowledgeRouterError(wrappedMessage, code, {
    originalError: error instanceof Error ? error.name : typeof error,
  });

  if (error instanceof Error && error.stack) {
    wrapped.stack = `${wrapped.stack}\nCaused by: ${error.stack}`;
  }

  return wrapped;
}

/**
 * Human-readable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
