import pg from 'pg';
import type { CustomTypesConfig } from 'pg';

import type { Logger } from '../logger';
import type {
  BindValues,
  ColumnDescriptor,
  ColumnValueList,
  DataSource,
  QueryContext,
  QueryRow
} from '../types';
import { bindSessionItems } from './bind-variables';

/**
 * The part of a `pg` client the data source uses.
 *
 * `PoolClient` satisfies it; tests pass an in-process fake.
 */
export interface PgClient {
  query(config: {
    text: string;
    values: unknown[];
    rowMode: 'array';
    types: CustomTypesConfig;
  }): Promise<{
    fields: readonly { name: string; dataTypeID: number }[];
    rows: unknown[][];
  }>;
  release(error?: Error | boolean): void;
}

/**
 * The part of a `pg` pool the data source uses. `Pool` satisfies it.
 */
export interface PgPool {
  connect(): Promise<PgClient>;
}

const JSON_OID = 114;
const JSONB_OID = 3802;

/**
 * Default parsers, except `json` and `jsonb`, which stay as the server's text.
 */
const verbatimJsonTypes = new pg.TypeOverrides();
verbatimJsonTypes.setTypeParser(JSON_OID, 'text', (value: string) => value);
verbatimJsonTypes.setTypeParser(JSONB_OID, 'text', (value: string) => value);

export type PgDataSourceOptions = {
  /**
   * Receives a warning for every `:ITEM` reference that has no bind value.
   */
  logger?: Logger;
};

/**
 * `DataSource` over a `pg` pool.
 *
 * Each query context checks out one client and returns it to the pool on
 * `close()`. Statements run with `rowMode: 'array'`, so duplicate column
 * labels keep their positions. `json` and `jsonb` cells arrive as text.
 *
 * @example
 * ```ts
 * const dataSource = createPgDataSource(new pg.Pool({ connectionString }));
 * ```
 */
export function createPgDataSource(
  pool: PgPool,
  options: PgDataSourceOptions = {}
): DataSource {
  const prepare = (sql: string, binds: BindValues, autoBindItems: boolean) => {
    if (!autoBindItems) return { text: sql, values: [] };

    const bound = bindSessionItems(sql, binds);
    if (bound.unresolved.length > 0) {
      options.logger?.warn('Unresolved bind items, binding null', {
        items: bound.unresolved
      });
    }
    return { text: bound.text, values: bound.values };
  };

  const run = async (text: string, values: unknown[]) => {
    const client = await pool.connect();
    try {
      const result = await client.query({
        text,
        values,
        rowMode: 'array',
        types: verbatimJsonTypes
      });
      return { client, result };
    } catch (error) {
      client.release(error instanceof Error ? error : true);
      throw error;
    }
  };

  return {
    async openQueryContext(sql, { binds, autoBindItems }) {
      const { text, values } = prepare(sql, binds, autoBindItems);
      const { client, result } = await run(text, values);

      const columns: ColumnDescriptor[] = result.fields.map(field => ({
        name: field.name,
        dataType: String(field.dataTypeID)
      }));

      let released = false;
      const context: QueryContext = {
        columns,
        async *rows(): AsyncGenerator<QueryRow> {
          yield* result.rows;
        },
        async close() {
          if (released) return;
          released = true;
          client.release();
        }
      };
      return context;
    },

    async fetchColumnValues(sql, { binds }): Promise<ColumnValueList> {
      const { text, values } = prepare(sql, binds, true);
      const { client, result } = await run(text, values);
      client.release();

      return result.fields.map((_, column) =>
        result.rows.map(row => row[column])
      );
    }
  };
}

export type PgConnection = {
  dataSource: DataSource;

  /**
   * Drains the pool.
   */
  end(): Promise<void>;
};

/**
 * Opens a pool for `connectionString` and wraps it as a `DataSource`.
 */
export function connectPgDataSource(
  connectionString: string,
  options: PgDataSourceOptions = {}
): PgConnection {
  const pool = new pg.Pool({ connectionString });
  return {
    dataSource: createPgDataSource(pool, options),
    end: () => pool.end()
  };
}
