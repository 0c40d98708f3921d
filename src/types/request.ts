import type { PayloadTrustBoundary } from '../architecture';
import type { Simplify } from './types-helper';

/**
 * The origin a payload is produced from.
 *
 * - `raw-query`:       a SQL statement whose whole result set becomes a JSON array of rows.
 * - `json-query`:      a SQL statement returning one row / one column holding a JSON document.
 * - `procedural-json`: a code block writing JSON incrementally through a `JsonWriter`.
 * - `static-json`:     JSON text supplied at design time.
 */
export type InjectionSource =
  | 'raw-query'
  | 'json-query'
  | 'procedural-json'
  | 'static-json';

/**
 * Maps each source to the single request field that carries its configuration.
 */
export type SourceFieldMap = {
  'raw-query': 'query';
  'json-query': 'jsonQuery';
  'procedural-json': 'proceduralBlock';
  'static-json': 'staticText';
};

export type SourceField = SourceFieldMap[InjectionSource];

/**
 * Builds one request variant: the discriminant, the target path and exactly
 * the field selected by `S`.
 */
type RequestVariant<S extends InjectionSource> = Simplify<
  { source: S; targetPath: string } & {
    [K in SourceFieldMap[S]]: string;
  }
>;

/**
 * The configuration for one invocation.
 *
 * Invariant:
 * Exactly one source field is populated, selected by `source`. The union
 * makes any other combination unrepresentable once a request is validated.
 *
 * @example
 * ```ts
 * const request: InjectionRequest = {
 *   source: 'static-json',
 *   staticText: '{"empNo":7839}',
 *   targetPath: 'myApp.data'
 * };
 * ```
 */
export type InjectionRequest =
  | RequestVariant<'raw-query'>
  | RequestVariant<'json-query'>
  | RequestVariant<'procedural-json'>
  | RequestVariant<'static-json'>;

export type RequestOf<S extends InjectionSource> = Extract<
  InjectionRequest,
  { source: S }
>;

/**
 * Already-serialized JSON text of unbounded length.
 *
 * Never parsed or re-validated by the emitter; see {@link PayloadTrustBoundary}.
 */
export type JsonPayload = string;

/**
 * Positional component attributes as stored by the host configuration store.
 *
 * - `attribute01`: source code (`sql`, `jsonsql`, `plsql`, `static`)
 * - `attribute02`: SQL query
 * - `attribute03`: SQL query returning a JSON document
 * - `attribute04`: procedural block
 * - `attribute05`: static JSON text
 * - `attribute06`: target path
 */
export type HostAttributes = {
  attribute01?: string | null;
  attribute02?: string | null;
  attribute03?: string | null;
  attribute04?: string | null;
  attribute05?: string | null;
  attribute06?: string | null;
};
