import { z } from 'zod';

import { ConfigurationError } from './errors';
import { isNonBlankString } from './guards';
import type { HostAttributes, InjectionRequest } from './types';
import { validateWithSchema } from './validator';

export type RequestSchemaOptions = {
  /**
   * Upper bound for each text field. Unset means no ceiling.
   */
  maxSourceLength?: number;
};

/**
 * Builds the strict schema for one request.
 *
 * Every variant is a strict object, so a request carrying a field of another
 * source (e.g. `query` next to `source: 'static-json'`) is rejected instead of
 * silently ignored.
 */
export function createInjectionRequestSchema(
  options: RequestSchemaOptions = {}
) {
  const text = () => {
    const base = z.string().trim().min(1, 'must not be empty');
    return options.maxSourceLength === undefined
      ? base
      : base.max(
          options.maxSourceLength,
          `must be at most ${options.maxSourceLength} characters`
        );
  };

  const targetPath = z.string().trim().min(1, 'must not be empty');

  return z.discriminatedUnion('source', [
    z
      .object({ source: z.literal('raw-query'), query: text(), targetPath })
      .strict(),
    z
      .object({ source: z.literal('json-query'), jsonQuery: text(), targetPath })
      .strict(),
    z
      .object({
        source: z.literal('procedural-json'),
        proceduralBlock: text(),
        targetPath
      })
      .strict(),
    z
      .object({
        source: z.literal('static-json'),
        staticText: text(),
        targetPath
      })
      .strict()
  ]);
}

const defaultRequestSchema = createInjectionRequestSchema();

/**
 * Validates untrusted request input.
 *
 * @throws ConfigurationError naming the first offending field.
 */
export function validateInjectionRequest(
  input: unknown,
  options: RequestSchemaOptions = {}
): InjectionRequest {
  const schema =
    options.maxSourceLength === undefined
      ? defaultRequestSchema
      : createInjectionRequestSchema(options);

  return validateWithSchema(schema, input, 'injection request');
}

const SOURCE_CODES = {
  sql: 'raw-query',
  jsonsql: 'json-query',
  plsql: 'procedural-json',
  static: 'static-json'
} as const;

type SourceCode = keyof typeof SOURCE_CODES;

function isSourceCode(value: string): value is SourceCode {
  return Object.hasOwn(SOURCE_CODES, value);
}

/**
 * Maps the six positional host attributes to a request.
 *
 * A missing source code falls back to `sql`. Only the field selected by the
 * code is copied; the result still goes through
 * {@link validateInjectionRequest} in the loader.
 *
 * @example
 * ```ts
 * requestFromAttributes({
 *   attribute01: 'static',
 *   attribute05: '{"a":1}',
 *   attribute06: 'myApp.data'
 * });
 * // { source: 'static-json', staticText: '{"a":1}', targetPath: 'myApp.data' }
 * ```
 *
 * @throws ConfigurationError for an unknown source code.
 */
export function requestFromAttributes(
  attributes: HostAttributes
): InjectionRequest {
  const code = isNonBlankString(attributes.attribute01)
    ? attributes.attribute01.trim().toLowerCase()
    : 'sql';

  if (!isSourceCode(code)) {
    throw new ConfigurationError(`Unknown source code "${code}".`, {
      details: { code },
      suggestion: `Use one of: ${Object.keys(SOURCE_CODES).join(', ')}.`
    });
  }

  const targetPath = attributes.attribute06 ?? '';

  switch (SOURCE_CODES[code]) {
    case 'raw-query':
      return {
        source: 'raw-query',
        query: attributes.attribute02 ?? '',
        targetPath
      };
    case 'json-query':
      return {
        source: 'json-query',
        jsonQuery: attributes.attribute03 ?? '',
        targetPath
      };
    case 'procedural-json':
      return {
        source: 'procedural-json',
        proceduralBlock: attributes.attribute04 ?? '',
        targetPath
      };
    case 'static-json':
      return {
        source: 'static-json',
        staticText: attributes.attribute05 ?? '',
        targetPath
      };
  }
}
