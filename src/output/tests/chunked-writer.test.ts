import { describe, expect, test } from 'vitest';

import { ConfigurationError } from '../../errors';
import { splitIntoChunks, writeChunked } from '../chunked-writer';
import { createBufferedOutput } from '../page-output';

/**
 * Test suite: bounded payload writes.
 *
 * Coverage:
 * - Round-trip for lengths around and across chunk boundaries.
 * - Surrogate pairs are never split.
 * - Chunk size validation.
 */

describe('Chunked Writer', () => {
  describe('Round-trip', () => {
    const chunkSize = 4;
    const lengths = [0, 1, 3, 4, 5, 8, 9, 12, 13].map(length => ({ length }));

    test.for(lengths)('[length $length] writes reassemble the payload', async ({
      length
    }) => {
      const payload = 'x'.repeat(length);
      const output = createBufferedOutput();

      const writes = await writeChunked(output, payload, chunkSize);

      expect(output.toString()).toBe(payload);
      expect(writes).toBe(Math.ceil(length / chunkSize));
      expect(output.writes).toHaveLength(writes);
      for (const chunk of output.writes) {
        expect(chunk.length).toBeGreaterThan(0);
        expect(chunk.length).toBeLessThanOrEqual(chunkSize);
      }
    });

    test('order is preserved for distinct content', () => {
      expect([...splitIntoChunks('abcdefghij', 3)]).toEqual([
        'abc',
        'def',
        'ghi',
        'j'
      ]);
    });
  });

  describe('Surrogate Pairs', () => {
    const scenarios: {
      id: string;
      text: string;
      chunkSize: number;
      expected: string[];
    }[] = [
      {
        id: 'Pair At Boundary',
        text: 'a\u{1F600}b',
        chunkSize: 2,
        expected: ['a', '\u{1F600}', 'b']
      },
      {
        id: 'Pair Fits',
        text: 'ab\u{1F600}',
        chunkSize: 2,
        expected: ['ab', '\u{1F600}']
      },
      {
        id: 'Pair Shifted',
        text: 'ab\u{1F600}c',
        chunkSize: 3,
        expected: ['ab', '\u{1F600}c']
      },
      {
        id: 'Consecutive Pairs',
        text: '\u{1F600}\u{1F601}',
        chunkSize: 3,
        expected: ['\u{1F600}', '\u{1F601}']
      }
    ];

    test.for(scenarios)('[$id] keeps each pair in one chunk', ({
      text,
      chunkSize,
      expected
    }) => {
      const chunks = [...splitIntoChunks(text, chunkSize)];
      expect(chunks).toEqual(expected);
      expect(chunks.join('')).toBe(text);
    });
  });

  describe('Chunk Size', () => {
    test.for([0, 1, 2.5, Number.NaN, -4].map(chunkSize => ({ chunkSize })))(
      '[$chunkSize] is rejected',
      ({ chunkSize }) => {
        expect(() => [...splitIntoChunks('abc', chunkSize)]).toThrow(
          ConfigurationError
        );
      }
    );

    test('an invalid size is rejected before anything is written', async () => {
      const output = createBufferedOutput();
      await expect(writeChunked(output, 'abc', 1)).rejects.toThrow(
        'Invalid chunk size 1: expected an integer of at least 2.'
      );
      expect(output.writes).toEqual([]);
    });
  });
});
