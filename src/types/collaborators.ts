import type { JsonWriter } from '../json-writer';
import type { Logger } from '../logger';

/**
 * Session item values available for automatic binding (e.g. `{ P1_DEPTNO: 10 }`).
 *
 * Item names are matched case-insensitively against `:NAME` references.
 */
export type BindValues = Readonly<Record<string, unknown>>;

export type ColumnDescriptor = {
  /**
   * Column label as returned by the statement; becomes the JSON property name.
   */
  name: string;

  /**
   * Driver-specific type hint (e.g. a PostgreSQL type OID rendered as text).
   */
  dataType?: string;
};

/**
 * One result row, positionally aligned with {@link QueryContext.columns}.
 */
export type QueryRow = readonly unknown[];

/**
 * An open statement execution holding driver resources.
 *
 * Lifecycle:
 * The caller that opened the context owns it and must call `close()` on every
 * exit path (rows consumed, no rows, or an error while reading).
 */
export interface QueryContext {
  readonly columns: readonly ColumnDescriptor[];
  rows(): AsyncIterable<QueryRow>;
  close(): Promise<void>;
}

export type QueryContextOptions = {
  binds: BindValues;

  /**
   * Rewrites `:ITEM` references into driver parameters bound from `binds`.
   */
  autoBindItems: boolean;
};

/**
 * Column-major result: `values[column][row]`.
 */
export type ColumnValueList = readonly (readonly unknown[])[];

export type FetchColumnValuesOptions = {
  binds: BindValues;
};

/**
 * The host's SQL engine, seen from the core.
 *
 * Implementations translate driver failures into thrown errors; the adapters
 * wrap them as `QueryExecutionError`.
 */
export interface DataSource {
  openQueryContext(
    sql: string,
    options: QueryContextOptions
  ): Promise<QueryContext>;

  fetchColumnValues(
    sql: string,
    options: FetchColumnValuesOptions
  ): Promise<ColumnValueList>;
}

export type CodeBlockContext = {
  binds: BindValues;
  logger: Logger;
};

/**
 * Runs a trusted code block that writes JSON into the supplied writer.
 *
 * The executor never frees the writer; the `procedural-json` adapter owns it.
 */
export interface CodeBlockExecutor {
  execute(
    block: string,
    json: JsonWriter,
    context: CodeBlockContext
  ): Promise<void>;
}

/**
 * The page output stream a fragment is appended to.
 *
 * A single `write` may be subject to a size ceiling; the emitter never passes
 * more than `chunkSize` code units of payload per call.
 */
export interface PageOutput {
  write(text: string): void | Promise<void>;
}
