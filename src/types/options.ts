import type { Logger } from '../logger';
import type {
  BindValues,
  CodeBlockExecutor,
  DataSource,
  PageOutput
} from './collaborators';

/**
 * Expression the emitted script uses to reach the page's global object.
 */
export type GlobalRoot = 'window' | 'globalThis' | 'self';

/**
 * Where the nested-object helper lives.
 *
 * - `scoped`: a local `var` inside the isolated scope, defined per fragment.
 * - `shared`: one function on the global root, defined behind a
 *   `typeof … !== "function"` guard and reused by later fragments.
 */
export type HelperRegistration = 'scoped' | 'shared';

/**
 * How database `NULL` column values are rendered into row objects.
 *
 * - `null`:         `"COMM":null`
 * - `empty-string`: `"COMM":""`
 * - `omit`:         the property is left out
 */
export type NullValuePolicy = 'null' | 'empty-string' | 'omit';

export type LoaderOptions = {
  /**
   * SQL engine used by the `raw-query` and `json-query` sources.
   */
  dataSource?: DataSource;

  /**
   * Runner for `procedural-json` blocks.
   */
  codeBlockExecutor?: CodeBlockExecutor;

  /**
   * @default createLogger({ level: 'warn', component: 'load-json-object' })
   */
  logger?: Logger;

  /**
   * @default 'window'
   */
  globalRoot?: GlobalRoot;

  /**
   * Maximum number of UTF-16 code units per payload write.
   *
   * Must be an integer >= 2 so a surrogate pair always fits in one chunk.
   *
   * @default 4000
   */
  chunkSize?: number;

  /**
   * @default 'scoped'
   */
  helperRegistration?: HelperRegistration;

  /**
   * Global property name used when `helperRegistration` is `shared`.
   *
   * @default '__loadJsonObjectCreateNestedObject'
   */
  sharedHelperName?: string;

  /**
   * Accept target path segments that are not JavaScript identifiers
   * (e.g. `my-app.data`). Such segments are still emitted as escaped string
   * literals, never as code.
   *
   * @default false
   */
  allowNonIdentifierSegments?: boolean;

  /**
   * @default 'null'
   */
  nullValues?: NullValuePolicy;

  /**
   * Upper bound for the length of each request text field. Unset means no
   * ceiling.
   */
  maxSourceLength?: number;
};

/**
 * {@link LoaderOptions} after defaults are applied.
 */
export type ResolvedLoaderOptions = Required<
  Omit<LoaderOptions, 'dataSource' | 'codeBlockExecutor' | 'maxSourceLength'>
> &
  Pick<LoaderOptions, 'dataSource' | 'codeBlockExecutor' | 'maxSourceLength'>;

/**
 * Per-render inputs supplied by the host pipeline.
 */
export type RenderContext = {
  output: PageOutput;

  /**
   * Session item values for automatic binding and code blocks.
   */
  binds?: BindValues;

  /**
   * CSP nonce added to the opening `<script>` tag.
   */
  scriptNonce?: string;
};
