import { describe, expect, test } from 'vitest';

import { createRecordingLogger } from '../../adapters/tests/fakes';
import { ConfigurationError, ExecutionError } from '../../errors';
import { JsonWriter } from '../../json-writer';
import { createProcedureRegistry } from '../procedure-registry';

describe('createProcedureRegistry', () => {
  const context = { binds: { P1_DEPTNO: 20 }, logger: createRecordingLogger().logger };

  test('runs the procedure registered under the block name', async () => {
    const registry = createProcedureRegistry().register('dept.summary', (json, { binds }) => {
      json.openObject();
      json.write('deptno', binds.P1_DEPTNO);
      json.closeObject();
    });
    const json = new JsonWriter();

    await registry.execute('dept.summary', json, context);

    expect(registry.has('dept.summary')).toBe(true);
    expect(json.getOutput()).toBe('{"deptno":20}');
  });

  test('awaits asynchronous procedures', async () => {
    const registry = createProcedureRegistry().register('later', async json => {
      await Promise.resolve();
      json.write('done');
    });
    const json = new JsonWriter();

    await registry.execute('later', json, context);

    expect(json.getOutput()).toBe('"done"');
  });

  test('an unknown block raises ExecutionError', async () => {
    const registry = createProcedureRegistry().register('known', () => undefined);

    await expect(
      registry.execute('unknown', new JsonWriter(), context)
    ).rejects.toThrow(new ExecutionError('No procedure named "unknown" is registered.'));
  });

  test.for([
    { id: 'Blank', name: '  ', message: 'A procedure name must not be empty.' },
    { id: 'Duplicate', name: 'dup', message: 'A procedure named "dup" is already registered.' }
  ])('[$id] registration is rejected', ({ name, message }) => {
    const registry = createProcedureRegistry().register('dup', () => undefined);

    expect(() => registry.register(name, () => undefined)).toThrow(ConfigurationError);
    expect(() => registry.register(name, () => undefined)).toThrow(message);
  });
});
