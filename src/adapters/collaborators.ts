import {
  ConfigurationError,
  LoadJsonObjectError,
  QueryExecutionError,
  getErrorMessage
} from '../errors';
import type { Logger } from '../logger';
import type {
  CodeBlockExecutor,
  DataSource,
  InjectionSource,
  QueryContext
} from '../types';
import type { AdapterContext } from './types';

export function requireDataSource(
  context: AdapterContext,
  source: InjectionSource
): DataSource {
  if (!context.dataSource) {
    throw new ConfigurationError(
      `The "${source}" source needs a data source, but none is configured.`,
      { suggestion: 'Pass `dataSource` to createJsonObjectLoader().' }
    );
  }
  return context.dataSource;
}

export function requireCodeBlockExecutor(
  context: AdapterContext,
  source: InjectionSource
): CodeBlockExecutor {
  if (!context.codeBlockExecutor) {
    throw new ConfigurationError(
      `The "${source}" source needs a code block executor, but none is configured.`,
      { suggestion: 'Pass `codeBlockExecutor` to createJsonObjectLoader().' }
    );
  }
  return context.codeBlockExecutor;
}

/**
 * Keeps taxonomy errors as they are and wraps driver failures.
 */
export function toQueryExecutionError(
  error: unknown,
  sql: string
): LoadJsonObjectError {
  if (error instanceof LoadJsonObjectError) return error;

  return new QueryExecutionError(
    `The query failed: ${getErrorMessage(error)}`,
    { details: { sql }, cause: error }
  );
}

/**
 * Closes a query context on an exit path.
 *
 * A failing `close()` is reported through the logger rather than thrown, so
 * it never replaces the error that is already propagating, and a payload
 * that was fully read is still delivered.
 */
export async function closeQueryContext(
  queryContext: QueryContext,
  logger: Logger
): Promise<void> {
  try {
    await queryContext.close();
  } catch (error) {
    logger.warn('Failed to close query context', {
      error: getErrorMessage(error)
    });
  }
}
