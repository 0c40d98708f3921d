import { JsonWriterError } from '../errors';
import type { ColumnDescriptor, QueryRow } from '../types/collaborators';
import type { NullValuePolicy } from '../types/options';
import { quoteJsonString, serializeJsonValue } from './serialize-value';

export { quoteJsonString, serializeJsonValue } from './serialize-value';

type ContainerKind = 'object' | 'array';

type Frame = {
  kind: ContainerKind;
  /**
   * Number of members already written; drives comma placement.
   */
  count: number;
};

export type JsonWriterOptions = {
  /**
   * Rendering of `null` / `undefined` values passed to `write`.
   *
   * `omit` only applies to named members; array elements always keep their
   * slot and render as `null`.
   *
   * @default 'null'
   */
  nullValues?: NullValuePolicy;
};

/**
 * Incremental, compact JSON builder used as the capture sink for procedural
 * sources and as the row encoder for raw queries.
 *
 * Grammar enforcement
 * -------------------
 * - Inside an object every value needs a name; inside an array none may have one.
 * - At most one top-level value.
 * - `closeObject` / `closeArray` must match the innermost open container.
 *
 * Violations raise `JsonWriterError` immediately, so a misbehaving code block
 * fails instead of producing malformed text.
 *
 * @example
 * ```ts
 * const json = new JsonWriter();
 * json.openObject();
 * json.write('k', 'v');
 * json.closeObject();
 * json.getOutput(); // '{"k":"v"}'
 * ```
 */
export class JsonWriter {
  private parts: string[] = [];
  private readonly stack: Frame[] = [];
  private rootWritten = false;
  private freed = false;
  private readonly nullValues: NullValuePolicy;

  constructor(options: JsonWriterOptions = {}) {
    this.nullValues = options.nullValues ?? 'null';
  }

  /**
   * Number of containers currently open.
   */
  get depth(): number {
    return this.stack.length;
  }

  /**
   * `true` once one top-level value has been written and every container is closed.
   */
  get isComplete(): boolean {
    return this.rootWritten && this.stack.length === 0;
  }

  get isFreed(): boolean {
    return this.freed;
  }

  openObject(name?: string): void {
    this.beginValue(name);
    this.parts.push('{');
    this.stack.push({ kind: 'object', count: 0 });
  }

  closeObject(): void {
    this.endContainer('object');
    this.parts.push('}');
  }

  openArray(name?: string): void {
    this.beginValue(name);
    this.parts.push('[');
    this.stack.push({ kind: 'array', count: 0 });
  }

  closeArray(): void {
    this.endContainer('array');
    this.parts.push(']');
  }

  /**
   * Writes a named member (inside an object) or an element (inside an array
   * or at the top level).
   *
   * @example
   * ```ts
   * json.write('department_name', 'ACCOUNTING'); // object member
   * json.write(7782);                            // array element
   * ```
   */
  write(...args: [value: unknown] | [name: string, value: unknown]): void {
    if (args.length === 2) {
      const [name, value] = args;
      if (value == null && this.nullValues === 'omit') {
        // Still validates the position so misuse is reported consistently.
        this.assertNamedPosition(name);
        return;
      }
      this.beginValue(name);
      this.parts.push(this.encode(value));
      return;
    }

    const [value] = args;
    this.beginValue(undefined);
    this.parts.push(value == null ? 'null' : serializeJsonValue(value));
  }

  /**
   * Writes already-serialized JSON text verbatim.
   *
   * The text is trusted; it is not parsed or validated.
   */
  writeRaw(...args: [json: string] | [name: string, json: string]): void {
    if (args.length === 2) {
      const [name, json] = args;
      this.beginValue(name);
      this.parts.push(json);
      return;
    }

    const [json] = args;
    this.beginValue(undefined);
    this.parts.push(json);
  }

  /**
   * Writes one result row as an object, column labels as member names.
   */
  writeRow(columns: readonly ColumnDescriptor[], row: QueryRow): void {
    this.openObject();
    columns.forEach((column, index) => {
      this.write(column.name, row[index]);
    });
    this.closeObject();
  }

  /**
   * Returns everything written so far.
   */
  getOutput(): string {
    this.assertUsable();
    const output = this.parts.join('');
    this.parts = [output];
    return output;
  }

  /**
   * Releases the captured text and resets the writer. Further calls raise
   * `JsonWriterError`. Calling `free` more than once is allowed.
   */
  free(): void {
    this.parts = [];
    this.stack.length = 0;
    this.rootWritten = false;
    this.freed = true;
  }

  private encode(value: unknown): string {
    if (value != null) return serializeJsonValue(value);
    return this.nullValues === 'empty-string' ? '""' : 'null';
  }

  private assertUsable(): void {
    if (this.freed) {
      throw new JsonWriterError('The JSON writer has already been freed.');
    }
  }

  private assertNamedPosition(name: string): void {
    this.assertUsable();
    const top = this.stack.at(-1);
    if (top?.kind !== 'object') {
      throw new JsonWriterError(
        `Cannot write member "${name}" outside of an object.`
      );
    }
  }

  private beginValue(name: string | undefined): void {
    this.assertUsable();
    const top = this.stack.at(-1);

    if (!top) {
      if (name !== undefined) {
        throw new JsonWriterError(
          `Cannot write member "${name}" outside of an object.`
        );
      }
      if (this.rootWritten) {
        throw new JsonWriterError(
          'A JSON document can only have one top-level value.'
        );
      }
      this.rootWritten = true;
      return;
    }

    if (top.kind === 'object') {
      if (name === undefined) {
        throw new JsonWriterError(
          'Values written inside an object need a member name.'
        );
      }
      if (top.count > 0) this.parts.push(',');
      this.parts.push(`${quoteJsonString(name)}:`);
    } else {
      if (name !== undefined) {
        throw new JsonWriterError(
          `Cannot write member "${name}" inside an array.`
        );
      }
      if (top.count > 0) this.parts.push(',');
    }

    top.count++;
  }

  private endContainer(kind: ContainerKind): void {
    this.assertUsable();
    const top = this.stack.at(-1);
    if (!top) {
      throw new JsonWriterError(`Cannot close an ${kind}: nothing is open.`);
    }
    if (top.kind !== kind) {
      throw new JsonWriterError(
        `Cannot close an ${kind} while an ${top.kind} is open.`
      );
    }
    this.stack.pop();
  }
}
