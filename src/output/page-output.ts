import { once } from 'node:events';
import type { Writable } from 'node:stream';

import type { PageOutput } from '../types/collaborators';

export type BufferedOutput = PageOutput & {
  /**
   * Every write, in order, as received.
   */
  readonly writes: readonly string[];
  toString(): string;
};

/**
 * Collects the fragment in memory, e.g. to splice it into a rendered page.
 */
export function createBufferedOutput(): BufferedOutput {
  const writes: string[] = [];
  return {
    writes,
    write(text: string) {
      writes.push(text);
    },
    toString() {
      return writes.join('');
    }
  };
}

/**
 * Adapts a Node.js `Writable` (e.g. an HTTP response) to {@link PageOutput}.
 *
 * Each write waits for `drain` when the stream signals back-pressure.
 */
export function createStreamOutput(stream: Writable): PageOutput {
  return {
    async write(text: string) {
      if (!stream.write(text)) {
        await once(stream, 'drain');
      }
    }
  };
}
