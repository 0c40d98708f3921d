import { assertChunkSize, writeChunked } from '../output';
import type { JsonPayload } from '../types';
import type { PageOutput } from '../types/collaborators';
import type { ScriptFragment } from './fragment-builder';

export {
  buildScriptFragment,
  type FragmentOptions,
  type ScriptFragment
} from './fragment-builder';
export {
  escapeHtmlAttribute,
  escapeScriptStringLiteral,
  type LiteralQuote
} from './script-literal';
export { parseTargetPath, type TargetPath } from './target-path';

export type EmitResult = {
  /**
   * Number of writes used for the payload alone.
   */
  payloadWrites: number;

  /**
   * Total UTF-16 code units written, tags included.
   */
  length: number;
};

/**
 * Appends a complete fragment to the page output:
 * `prefix`, the payload in bounded chunks, then `suffix`.
 *
 * The control parts are short and written in one call each; only the
 * payload goes through {@link writeChunked}.
 */
export async function emitFragment(
  output: PageOutput,
  fragment: ScriptFragment,
  payload: JsonPayload,
  chunkSize: number
): Promise<EmitResult> {
  assertChunkSize(chunkSize);

  await output.write(fragment.prefix);
  const payloadWrites = await writeChunked(output, payload, chunkSize);
  await output.write(fragment.suffix);

  return {
    payloadWrites,
    length: fragment.prefix.length + payload.length + fragment.suffix.length
  };
}
