import type { ChunkedOutputDiscipline } from '../architecture';
import { ConfigurationError } from '../errors';
import { isValidChunkSize } from '../guards';
import type { PageOutput } from '../types/collaborators';

function isHighSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xd800 && codeUnit <= 0xdbff;
}

function isLowSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xdc00 && codeUnit <= 0xdfff;
}

export function assertChunkSize(chunkSize: number): void {
  if (!isValidChunkSize(chunkSize)) {
    throw new ConfigurationError(
      `Invalid chunk size ${chunkSize}: expected an integer of at least 2.`,
      { details: { chunkSize } }
    );
  }
}

/**
 * Splits `text` into consecutive slices of at most `chunkSize` UTF-16 code
 * units, per {@link ChunkedOutputDiscipline}.
 *
 * A slice is shortened by one unit when it would otherwise end between the
 * high and low half of a surrogate pair.
 *
 * @example
 * ```ts
 * [...splitIntoChunks('abcde', 2)]; // ['ab', 'cd', 'e']
 * ```
 */
export function* splitIntoChunks(
  text: string,
  chunkSize: number
): Generator<string, void, undefined> {
  assertChunkSize(chunkSize);

  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (
      end < text.length &&
      isHighSurrogate(text.charCodeAt(end - 1)) &&
      isLowSurrogate(text.charCodeAt(end))
    ) {
      end--;
    }

    yield text.slice(start, end);
    start = end;
  }
}

/**
 * Writes `text` to `output` in sequential bounded chunks, awaiting each write.
 *
 * @returns The number of writes issued (0 for empty text).
 */
export async function writeChunked(
  output: PageOutput,
  text: string,
  chunkSize: number
): Promise<number> {
  let writes = 0;
  for (const chunk of splitIntoChunks(text, chunkSize)) {
    await output.write(chunk);
    writes++;
  }
  return writes;
}
