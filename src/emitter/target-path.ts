import { ConfigurationError } from '../errors';

/**
 * A validated target path.
 *
 * `segments` is never empty; `leaf` is its last element and `path` the
 * normalized dotted form handed to the nested-object helper.
 */
export type TargetPath = {
  readonly path: string;
  readonly segments: readonly string[];
  readonly leaf: string;
};

export type TargetPathOptions = {
  allowNonIdentifierSegments: boolean;
};

const IDENTIFIER = /^[\p{ID_Start}$_][\p{ID_Continue}$\u200C\u200D]*$/u;

/**
 * Segments that would walk into or replace an object's prototype chain
 * instead of creating a property.
 */
const FORBIDDEN_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Parses and validates a dotted target path such as `myApp.data`.
 *
 * Rules
 * -----
 * 1. Surrounding whitespace is ignored; the remainder must not be empty.
 * 2. Every `.`-separated segment must be non-empty (`a..b`, `.a`, `a.` fail).
 * 3. `__proto__`, `prototype` and `constructor` are rejected.
 * 4. Unless `allowNonIdentifierSegments` is set, each segment must be a
 *    JavaScript identifier.
 *
 * A path that resolves to no segment never falls back to assigning onto the
 * global root itself.
 *
 * @throws ConfigurationError when any rule is violated.
 */
export function parseTargetPath(
  input: string,
  options: TargetPathOptions
): TargetPath {
  const path = input.trim();

  if (path.length === 0) {
    throw new ConfigurationError('The target path is empty.', {
      suggestion: 'Provide a dotted variable path such as "myApp.data".'
    });
  }

  const segments = path.split('.');
  const leaf = segments.at(-1);

  segments.forEach((segment, index) => {
    if (segment.length === 0) {
      throw new ConfigurationError(
        `The target path "${path}" has an empty segment at position ${index + 1}.`,
        { details: { targetPath: path, position: index + 1 } }
      );
    }

    if (FORBIDDEN_SEGMENTS.has(segment)) {
      throw new ConfigurationError(
        `The target path "${path}" uses the reserved segment "${segment}".`,
        { details: { targetPath: path, segment } }
      );
    }

    if (!options.allowNonIdentifierSegments && !IDENTIFIER.test(segment)) {
      throw new ConfigurationError(
        `The target path segment "${segment}" is not a valid JavaScript identifier.`,
        {
          details: { targetPath: path, segment },
          suggestion:
            'Rename the segment or enable "allowNonIdentifierSegments".'
        }
      );
    }
  });

  if (leaf === undefined) {
    throw new ConfigurationError(`The target path "${path}" has no segments.`);
  }

  return { path, segments, leaf };
}
