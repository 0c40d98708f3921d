import type { Logger } from '../logger';
import type {
  BindValues,
  CodeBlockExecutor,
  DataSource,
  InjectionSource,
  JsonPayload,
  NullValuePolicy,
  RequestOf
} from '../types';

/**
 * Everything an adapter may touch during one `produce` call.
 */
export type AdapterContext = {
  dataSource?: DataSource;
  codeBlockExecutor?: CodeBlockExecutor;
  binds: BindValues;
  nullValues: NullValuePolicy;
  logger: Logger;
};

/**
 * One strategy for obtaining a payload.
 *
 * Contract
 * --------
 * - Resolves with one serialized JSON document of arbitrary length.
 * - Releases every resource it acquired before settling, on success and on
 *   failure.
 * - Rejects with a `LoadJsonObjectError` subclass; driver or block errors are
 *   kept as `cause`.
 */
export interface SourceAdapter<S extends InjectionSource> {
  readonly source: S;
  produce(request: RequestOf<S>, context: AdapterContext): Promise<JsonPayload>;
}
