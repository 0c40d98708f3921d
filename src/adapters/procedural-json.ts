import {
  ContractViolationError,
  ExecutionError,
  getErrorMessage
} from '../errors';
import { JsonWriter } from '../json-writer';
import { requireCodeBlockExecutor } from './collaborators';
import type { SourceAdapter } from './types';

/**
 * Runs a trusted code block against a fresh capture writer and returns what
 * it wrote.
 *
 * Failure modes
 * -------------
 * - The block throws (including writer misuse) -> `ExecutionError`, cause kept.
 * - The block leaves containers open or writes nothing -> `ContractViolationError`.
 *
 * The writer is freed on every exit path.
 */
export const proceduralJsonAdapter: SourceAdapter<'procedural-json'> = {
  source: 'procedural-json',

  async produce(request, context) {
    const executor = requireCodeBlockExecutor(context, request.source);
    const json = new JsonWriter({ nullValues: context.nullValues });

    try {
      try {
        await executor.execute(request.proceduralBlock, json, {
          binds: context.binds,
          logger: context.logger
        });
      } catch (error) {
        if (error instanceof ExecutionError) throw error;
        throw new ExecutionError(
          `The code block "${request.proceduralBlock}" failed: ${getErrorMessage(error)}`,
          { details: { block: request.proceduralBlock }, cause: error }
        );
      }

      if (!json.isComplete) {
        throw new ContractViolationError(
          json.depth > 0
            ? `The code block "${request.proceduralBlock}" left ${json.depth} JSON container(s) open.`
            : `The code block "${request.proceduralBlock}" did not write any JSON.`,
          { details: { block: request.proceduralBlock, openContainers: json.depth } }
        );
      }

      return json.getOutput();
    } finally {
      json.free();
    }
  }
};
