import { ConfigurationError, ExecutionError } from '../errors';
import { isNonBlankString } from '../guards';
import type { JsonWriter } from '../json-writer';
import type { CodeBlockContext, CodeBlockExecutor } from '../types';

/**
 * A named code block: writes one JSON document into `json`.
 */
export type JsonProcedure = (
  json: JsonWriter,
  context: CodeBlockContext
) => void | Promise<void>;

export interface ProcedureRegistry extends CodeBlockExecutor {
  register(name: string, procedure: JsonProcedure): ProcedureRegistry;
  has(name: string): boolean;
}

/**
 * `CodeBlockExecutor` that resolves a `procedural-json` block by name.
 *
 * @example
 * ```ts
 * const registry = createProcedureRegistry().register('emp.summary', json => {
 *   json.openObject();
 *   json.write('count', 14);
 *   json.closeObject();
 * });
 * ```
 */
export function createProcedureRegistry(): ProcedureRegistry {
  const procedures = new Map<string, JsonProcedure>();

  const registry: ProcedureRegistry = {
    register(name, procedure) {
      if (!isNonBlankString(name)) {
        throw new ConfigurationError('A procedure name must not be empty.');
      }
      if (procedures.has(name)) {
        throw new ConfigurationError(
          `A procedure named "${name}" is already registered.`
        );
      }
      procedures.set(name, procedure);
      return registry;
    },

    has(name) {
      return procedures.has(name);
    },

    async execute(block, json, context) {
      const procedure = procedures.get(block);
      if (!procedure) {
        throw new ExecutionError(`No procedure named "${block}" is registered.`, {
          details: { block, registered: [...procedures.keys()] }
        });
      }
      await procedure(json, context);
    }
  };

  return registry;
}
