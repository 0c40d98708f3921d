import { JsonWriterError } from '../errors';
import { isPlainObject } from '../guards';

const SCRIPT_SENSITIVE = /[<>&\u2028\u2029]/g;

/**
 * `JSON.stringify` for a string, with `<`, `>`, `&`, U+2028 and U+2029 as
 * `\uXXXX` escapes. The result is still valid JSON and cannot end a
 * `<script>` element.
 */
export function quoteJsonString(text: string): string {
  return JSON.stringify(text).replace(
    SCRIPT_SENSITIVE,
    char => `\\u${char.charCodeAt(0).toString(16).toUpperCase().padStart(4, '0')}`
  );
}

/**
 * Serializes a single non-null value into JSON text.
 *
 * Type mapping
 * ------------
 * - `string`                   -> JSON string via `quoteJsonString`
 * - `boolean`                  -> JSON literal
 * - `number`                   -> JSON number; `NaN` and `±Infinity` -> `null`
 * - `bigint`                   -> JSON number text (no precision loss)
 * - `Date`                     -> ISO-8601 string; invalid dates -> `null`
 * - `Uint8Array` (incl. Buffer)-> base64 string
 * - arrays / plain objects     -> nested JSON (nested `null`/`undefined` -> `null`,
 *                                 `undefined` properties are skipped)
 * - objects with `toJSON()`    -> serialized result of `toJSON()`
 *
 * Functions and symbols have no JSON form and raise `JsonWriterError`.
 *
 * @param value
 *   Value to serialize; callers handle `null`/`undefined` per their policy.
 * @returns
 *   JSON text for `value`.
 */
export function serializeJsonValue(value: unknown): string {
  if (value === null || value === undefined) return 'null';

  switch (typeof value) {
    case 'string':
      return quoteJsonString(value);

    case 'boolean':
      return JSON.stringify(value);

    case 'number':
      return Number.isFinite(value) ? JSON.stringify(value) : 'null';

    case 'bigint':
      return value.toString();

    case 'function':
    case 'symbol':
      throw new JsonWriterError(
        `Cannot serialize a value of type "${typeof value}" as JSON.`
      );

    default:
      return serializeObject(value);
  }
}

function serializeObject(value: object): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? 'null'
      : quoteJsonString(value.toISOString());
  }

  if (value instanceof Uint8Array) {
    return quoteJsonString(
      Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString(
        'base64'
      )
    );
  }

  if (Array.isArray(value)) {
    return `[${value.map(item => serializeJsonValue(item)).join(',')}]`;
  }

  if (isPlainObject(value)) {
    const members: string[] = [];
    for (const [key, child] of Object.entries(value)) {
      if (child === undefined) continue;
      members.push(`${quoteJsonString(key)}:${serializeJsonValue(child)}`);
    }
    return `{${members.join(',')}}`;
  }

  if ('toJSON' in value && typeof value.toJSON === 'function') {
    const replacement: unknown = value.toJSON();
    return serializeJsonValue(replacement);
  }

  // Class instances without `toJSON` keep JSON.stringify's own-enumerable view.
  return serializeJsonValue({ ...value });
}
