/**
 * Error taxonomy for a single injection.
 *
 * Every error is raised before the first write to the page output, so a
 * failed render never leaves a partial `<script>` block behind.
 */

export type LoadJsonObjectErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'QUERY_EXECUTION_ERROR'
  | 'EXECUTION_ERROR'
  | 'CONTRACT_VIOLATION'
  | 'JSON_WRITER_ERROR';

export type ErrorDetails = Record<string, unknown>;

export type LoadJsonObjectErrorInit = {
  details?: ErrorDetails;
  suggestion?: string;
  cause?: unknown;
};

export class LoadJsonObjectError extends Error {
  readonly code: LoadJsonObjectErrorCode;
  readonly details?: ErrorDetails;
  readonly suggestion?: string;

  constructor(
    message: string,
    code: LoadJsonObjectErrorCode,
    init: LoadJsonObjectErrorInit = {}
  ) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = 'LoadJsonObjectError';
    this.code = code;
    this.details = init.details;
    this.suggestion = init.suggestion;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Bad or missing request fields, target path, option or collaborator.
 * Fatal: the injection is aborted.
 */
export class ConfigurationError extends LoadJsonObjectError {
  constructor(message: string, init?: LoadJsonObjectErrorInit) {
    super(message, 'CONFIGURATION_ERROR', init);
    this.name = 'ConfigurationError';
  }
}

/**
 * The SQL statement behind a `raw-query` or `json-query` source failed.
 */
export class QueryExecutionError extends LoadJsonObjectError {
  constructor(message: string, init?: LoadJsonObjectErrorInit) {
    super(message, 'QUERY_EXECUTION_ERROR', init);
    this.name = 'QueryExecutionError';
  }
}

/**
 * The code block behind a `procedural-json` source failed.
 */
export class ExecutionError extends LoadJsonObjectError {
  constructor(message: string, init?: LoadJsonObjectErrorInit) {
    super(message, 'EXECUTION_ERROR', init);
    this.name = 'ExecutionError';
  }
}

/**
 * A source produced something other than exactly one JSON document
 * (wrong cardinality, empty output, unclosed containers).
 */
export class ContractViolationError extends LoadJsonObjectError {
  constructor(message: string, init?: LoadJsonObjectErrorInit) {
    super(message, 'CONTRACT_VIOLATION', init);
    this.name = 'ContractViolationError';
  }
}

export class JsonWriterError extends LoadJsonObjectError {
  constructor(message: string, init?: LoadJsonObjectErrorInit) {
    super(message, 'JSON_WRITER_ERROR', init);
    this.name = 'JsonWriterError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

export function isErrorCode(
  error: unknown,
  code: LoadJsonObjectErrorCode
): boolean {
  return error instanceof LoadJsonObjectError && error.code === code;
}
