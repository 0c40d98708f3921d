import { describe, expect, test } from 'vitest';

import {
  ConfigurationError,
  ContractViolationError,
  ExecutionError,
  JsonWriterError,
  QueryExecutionError
} from '../../errors';
import type { JsonWriter } from '../../json-writer';
import type { CodeBlockExecutor, ColumnValueList, InjectionRequest } from '../../types';
import { producePayload } from '..';
import {
  createAdapterContext,
  createFakeDataSource,
  createRecordingLogger
} from './fakes';

/**
 * Test suite: source adapters.
 *
 * Coverage:
 * - One payload per source, dispatched on `request.source`.
 * - Cardinality contract for JSON queries.
 * - Resource release on success and failure paths.
 */

const rawQuery = (query = 'select empno, comm from emp'): InjectionRequest => ({
  source: 'raw-query',
  query,
  targetPath: 'myApp.emps'
});

const jsonQuery: InjectionRequest = {
  source: 'json-query',
  jsonQuery: 'select json_agg(e) from emp e',
  targetPath: 'myApp.emps'
};

const procedural: InjectionRequest = {
  source: 'procedural-json',
  proceduralBlock: 'emp.summary',
  targetPath: 'myApp.summary'
};

/**
 * Helper: An executor that runs `body` for every block.
 */
const executorOf = (body: CodeBlockExecutor['execute']): CodeBlockExecutor => ({
  execute: body
});

describe('Source Adapters', () => {
  describe('raw-query', () => {
    test('zero rows encode as an empty array', async () => {
      const dataSource = createFakeDataSource({
        columns: [{ name: 'EMPNO' }]
      });

      const payload = await producePayload(
        rawQuery(),
        createAdapterContext({ dataSource })
      );

      expect(payload).toBe('[]');
      expect(dataSource.closed).toBe(1);
    });

    test('rows encode as objects keyed by column label', async () => {
      const dataSource = createFakeDataSource({
        columns: [{ name: 'EMPNO' }, { name: 'COMM' }],
        rows: [
          [7369, null],
          [7499, 300]
        ]
      });

      const payload = await producePayload(
        rawQuery(),
        createAdapterContext({ dataSource })
      );

      expect(payload).toBe('[{"EMPNO":7369,"COMM":null},{"EMPNO":7499,"COMM":300}]');
    });

    test('the null policy applies to row values', async () => {
      const dataSource = createFakeDataSource({
        columns: [{ name: 'EMPNO' }, { name: 'COMM' }],
        rows: [[7369, null]]
      });

      const payload = await producePayload(
        rawQuery(),
        createAdapterContext({ dataSource, nullValues: 'omit' })
      );

      expect(payload).toBe('[{"EMPNO":7369}]');
    });

    test('the statement is opened with automatic item binding', async () => {
      const dataSource = createFakeDataSource();
      const binds = { P1_DEPTNO: 10 };

      await producePayload(
        rawQuery('select * from emp where deptno = :P1_DEPTNO'),
        createAdapterContext({ dataSource, binds })
      );

      expect(dataSource.opened).toEqual([
        {
          sql: 'select * from emp where deptno = :P1_DEPTNO',
          options: { binds, autoBindItems: true }
        }
      ]);
    });

    test('a failing statement raises QueryExecutionError with the cause kept', async () => {
      const cause = new Error('relation "emp" does not exist');
      const dataSource = createFakeDataSource({ openError: cause });

      const failure = producePayload(rawQuery(), createAdapterContext({ dataSource }));

      await expect(failure).rejects.toBeInstanceOf(QueryExecutionError);
      await expect(failure).rejects.toMatchObject({
        message: 'The query failed: relation "emp" does not exist',
        cause
      });
      expect(dataSource.closed).toBe(0);
    });

    test('the context is closed when reading rows fails', async () => {
      const dataSource = createFakeDataSource({
        columns: [{ name: 'A' }],
        rows: [[1]],
        rowError: new Error('connection reset')
      });

      await expect(
        producePayload(rawQuery(), createAdapterContext({ dataSource }))
      ).rejects.toThrow('The query failed: connection reset');
      expect(dataSource.closed).toBe(1);
    });

    test('a row value without a JSON form keeps its writer error', async () => {
      const dataSource = createFakeDataSource({
        columns: [{ name: 'A' }],
        rows: [[Symbol('s')]]
      });

      await expect(
        producePayload(rawQuery(), createAdapterContext({ dataSource }))
      ).rejects.toBeInstanceOf(JsonWriterError);
      expect(dataSource.closed).toBe(1);
    });

    test('a failing close is logged and the payload still delivered', async () => {
      const { logger, records } = createRecordingLogger();
      const dataSource = createFakeDataSource({
        columns: [{ name: 'A' }],
        rows: [[1]],
        closeError: new Error('already released')
      });

      const payload = await producePayload(
        rawQuery(),
        createAdapterContext({ dataSource, logger })
      );

      expect(payload).toBe('[{"A":1}]');
      expect(records.filter(record => record.level === 'warn')).toEqual([
        expect.objectContaining({
          message: 'Failed to close query context',
          error: 'already released'
        })
      ]);
    });
  });

  describe('json-query', () => {
    const cells: {
      id: string;
      values: ColumnValueList;
      expected: string;
    }[] = [
      { id: 'Text', values: [['{"a":1}']], expected: '{"a":1}' },
      {
        id: 'Binary',
        values: [[new TextEncoder().encode('[1,2]')]],
        expected: '[1,2]'
      },
      { id: 'Parsed Document', values: [[{ a: [1, 2] }]], expected: '{"a":[1,2]}' }
    ];

    test.for(cells)('[$id] cell becomes the payload', async ({ values, expected }) => {
      const dataSource = createFakeDataSource({ values });

      const payload = await producePayload(
        jsonQuery,
        createAdapterContext({ dataSource })
      );

      expect(payload).toBe(expected);
    });

    const violations: {
      id: string;
      values: ColumnValueList;
      message: string;
    }[] = [
      {
        id: 'Zero Rows',
        values: [[]],
        message: 'The JSON query must return exactly 1 row, but returned no rows.'
      },
      {
        id: 'Two Rows',
        values: [['{}', '{}']],
        message: 'The JSON query must return exactly 1 row, but returned 2.'
      },
      {
        id: 'Two Columns',
        values: [['{}'], ['{}']],
        message: 'The JSON query must return exactly 1 column, but returned 2.'
      },
      {
        id: 'Null',
        values: [[null]],
        message: 'The JSON query returned NULL instead of a JSON document.'
      },
      {
        id: 'Bigint',
        values: [[1n]],
        message:
          'The JSON query returned a value of type "bigint" instead of a JSON document.'
      }
    ];

    test.for(violations)('[$id] raises ContractViolationError', async ({
      values,
      message
    }) => {
      const dataSource = createFakeDataSource({ values });
      const failure = producePayload(jsonQuery, createAdapterContext({ dataSource }));

      await expect(failure).rejects.toBeInstanceOf(ContractViolationError);
      await expect(failure).rejects.toThrow(message);
    });

    test('the statement receives the session binds', async () => {
      const dataSource = createFakeDataSource({ values: [['{}']] });
      const binds = { APP_USER: 'SCOTT' };

      await producePayload(jsonQuery, createAdapterContext({ dataSource, binds }));

      expect(dataSource.fetched).toEqual([
        { sql: 'select json_agg(e) from emp e', binds }
      ]);
    });

    test('a failing statement raises QueryExecutionError', async () => {
      const dataSource = createFakeDataSource({ openError: new Error('syntax error') });

      await expect(
        producePayload(jsonQuery, createAdapterContext({ dataSource }))
      ).rejects.toBeInstanceOf(QueryExecutionError);
    });
  });

  describe('procedural-json', () => {
    test('the block output becomes the payload', async () => {
      const codeBlockExecutor = executorOf(async (_block, json) => {
        json.openObject();
        json.write('k', 'v');
        json.closeObject();
      });

      const payload = await producePayload(
        procedural,
        createAdapterContext({ codeBlockExecutor })
      );

      expect(payload).toBe('{"k":"v"}');
    });

    test('the block receives its name and the session binds', async () => {
      const seen: { block: string; binds: unknown }[] = [];
      const codeBlockExecutor = executorOf(async (block, json, context) => {
        seen.push({ block, binds: context.binds });
        json.write(true);
      });

      await producePayload(
        procedural,
        createAdapterContext({ codeBlockExecutor, binds: { P1_ID: 1 } })
      );

      expect(seen).toEqual([{ block: 'emp.summary', binds: { P1_ID: 1 } }]);
    });

    test('a throwing block raises ExecutionError with the cause kept', async () => {
      const cause = new Error('no data found');
      const codeBlockExecutor = executorOf(async () => {
        throw cause;
      });

      const failure = producePayload(
        procedural,
        createAdapterContext({ codeBlockExecutor })
      );

      await expect(failure).rejects.toBeInstanceOf(ExecutionError);
      await expect(failure).rejects.toMatchObject({
        message: 'The code block "emp.summary" failed: no data found',
        cause
      });
    });

    test('writer misuse inside the block is an ExecutionError', async () => {
      const codeBlockExecutor = executorOf(async (_block, json) => {
        json.openArray();
        json.write('k', 1);
      });

      const failure = producePayload(
        procedural,
        createAdapterContext({ codeBlockExecutor })
      );

      await expect(failure).rejects.toBeInstanceOf(ExecutionError);
      await expect(failure).rejects.toMatchObject({
        cause: expect.any(JsonWriterError)
      });
    });

    test.for([
      {
        id: 'Unclosed',
        write: (json: { openObject(): void }) => json.openObject(),
        message: 'The code block "emp.summary" left 1 JSON container(s) open.'
      },
      {
        id: 'Empty',
        write: () => undefined,
        message: 'The code block "emp.summary" did not write any JSON.'
      }
    ])('[$id] incomplete output raises ContractViolationError', async ({
      write,
      message
    }) => {
      const codeBlockExecutor = executorOf(async (_block, json) => write(json));

      const failure = producePayload(
        procedural,
        createAdapterContext({ codeBlockExecutor })
      );

      await expect(failure).rejects.toBeInstanceOf(ContractViolationError);
      await expect(failure).rejects.toThrow(message);
    });

    test('the writer is freed once the block has run', async () => {
      const captured: JsonWriter[] = [];
      const codeBlockExecutor = executorOf(async (_block, json) => {
        captured.push(json);
        json.write(1);
      });

      await producePayload(procedural, createAdapterContext({ codeBlockExecutor }));

      expect(captured).toHaveLength(1);
      expect(captured[0]?.isFreed).toBe(true);
    });
  });

  describe('static-json', () => {
    test('the design-time text is returned unmodified', async () => {
      const payload = await producePayload(
        { source: 'static-json', staticText: '{ "a" : 1 }', targetPath: 'x' },
        createAdapterContext()
      );

      expect(payload).toBe('{ "a" : 1 }');
    });
  });

  describe('Missing Collaborators', () => {
    test.for([
      { request: rawQuery(), message: 'The "raw-query" source needs a data source' },
      { request: jsonQuery, message: 'The "json-query" source needs a data source' },
      {
        request: procedural,
        message: 'The "procedural-json" source needs a code block executor'
      }
    ])('$request.source raises ConfigurationError', async ({ request, message }) => {
      const failure = producePayload(request, createAdapterContext());

      await expect(failure).rejects.toBeInstanceOf(ConfigurationError);
      await expect(failure).rejects.toThrow(message);
    });
  });
});
