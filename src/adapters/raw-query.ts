import { JsonWriter } from '../json-writer';
import type { QueryContext } from '../types';
import {
  closeQueryContext,
  requireDataSource,
  toQueryExecutionError
} from './collaborators';
import type { SourceAdapter } from './types';

/**
 * Runs the statement with automatic item binding and encodes the whole
 * result set as a JSON array of row objects (column labels as keys).
 *
 * Zero rows yield `[]`. The query context and the row writer are released on
 * every exit path.
 *
 * @example
 * `select empno, comm from emp` ->
 * `[{"EMPNO":7369,"COMM":null},{"EMPNO":7499,"COMM":300}]`
 */
export const rawQueryAdapter: SourceAdapter<'raw-query'> = {
  source: 'raw-query',

  async produce(request, context) {
    const dataSource = requireDataSource(context, request.source);
    const json = new JsonWriter({ nullValues: context.nullValues });
    let queryContext: QueryContext | undefined;

    try {
      queryContext = await dataSource.openQueryContext(request.query, {
        binds: context.binds,
        autoBindItems: true
      });

      json.openArray();
      let rowCount = 0;
      for await (const row of queryContext.rows()) {
        json.writeRow(queryContext.columns, row);
        rowCount++;
      }
      json.closeArray();

      context.logger.debug('Raw query encoded', {
        rows: rowCount,
        columns: queryContext.columns.length
      });

      return json.getOutput();
    } catch (error) {
      throw toQueryExecutionError(error, request.query);
    } finally {
      json.free();
      if (queryContext) {
        await closeQueryContext(queryContext, context.logger);
      }
    }
  }
};
