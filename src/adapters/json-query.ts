import { ContractViolationError } from '../errors';
import { isRecord } from '../guards';
import { serializeJsonValue } from '../json-writer';
import type { ColumnValueList } from '../types';
import { requireDataSource, toQueryExecutionError } from './collaborators';
import type { SourceAdapter } from './types';

/**
 * Converts the single fetched cell into payload text.
 *
 * - text              -> verbatim
 * - binary            -> UTF-8 decoded
 * - parsed documents  -> re-serialized (drivers that decode `json` columns)
 */
function cellToPayload(cell: unknown): string {
  if (typeof cell === 'string') return cell;

  if (cell instanceof Uint8Array) {
    return Buffer.from(cell.buffer, cell.byteOffset, cell.byteLength).toString(
      'utf8'
    );
  }

  if (isRecord(cell) || typeof cell === 'number' || typeof cell === 'boolean') {
    return serializeJsonValue(cell);
  }

  throw new ContractViolationError(
    `The JSON query returned a value of type "${typeof cell}" instead of a JSON document.`
  );
}

/**
 * Enforces the one-column / one-row / non-null contract.
 *
 * @returns The single cell value.
 */
function selectSingleCell(values: ColumnValueList, sql: string): unknown {
  if (values.length !== 1) {
    throw new ContractViolationError(
      `The JSON query must return exactly 1 column, but returned ${values.length}.`,
      { details: { sql, columns: values.length } }
    );
  }

  const [column = []] = values;

  if (column.length === 0) {
    throw new ContractViolationError(
      'The JSON query must return exactly 1 row, but returned no rows.',
      {
        details: { sql, rows: 0 },
        suggestion:
          'Aggregate the result (e.g. json_arrayagg / json_agg) so the query always yields one row.'
      }
    );
  }

  if (column.length > 1) {
    throw new ContractViolationError(
      `The JSON query must return exactly 1 row, but returned ${column.length}.`,
      { details: { sql, rows: column.length } }
    );
  }

  const [cell] = column;
  if (cell === null || cell === undefined) {
    throw new ContractViolationError(
      'The JSON query returned NULL instead of a JSON document.',
      { details: { sql } }
    );
  }

  return cell;
}

/**
 * Fetches the pre-built JSON document held by the statement's single cell.
 *
 * Cardinality violations are never defaulted to an empty object; they raise
 * `ContractViolationError`.
 */
export const jsonQueryAdapter: SourceAdapter<'json-query'> = {
  source: 'json-query',

  async produce(request, context) {
    const dataSource = requireDataSource(context, request.source);

    let values: ColumnValueList;
    try {
      values = await dataSource.fetchColumnValues(request.jsonQuery, {
        binds: context.binds
      });
    } catch (error) {
      throw toQueryExecutionError(error, request.jsonQuery);
    }

    return cellToPayload(selectSingleCell(values, request.jsonQuery));
  }
};
