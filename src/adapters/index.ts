import type { InjectionRequest, InjectionSource, JsonPayload } from '../types';
import { jsonQueryAdapter } from './json-query';
import { proceduralJsonAdapter } from './procedural-json';
import { rawQueryAdapter } from './raw-query';
import { staticJsonAdapter } from './static-json';
import type { AdapterContext, SourceAdapter } from './types';

export type { AdapterContext, SourceAdapter } from './types';
export {
  jsonQueryAdapter,
  proceduralJsonAdapter,
  rawQueryAdapter,
  staticJsonAdapter
};

/**
 * The adapter registry: exactly one strategy per source.
 */
export const SOURCE_ADAPTERS: {
  readonly [S in InjectionSource]: SourceAdapter<S>;
} = {
  'raw-query': rawQueryAdapter,
  'json-query': jsonQueryAdapter,
  'procedural-json': proceduralJsonAdapter,
  'static-json': staticJsonAdapter
};

/**
 * Runs the single adapter selected by `request.source`.
 *
 * The switch narrows the request union per branch, so each adapter receives
 * its own request variant without assertions.
 */
export function producePayload(
  request: InjectionRequest,
  context: AdapterContext
): Promise<JsonPayload> {
  switch (request.source) {
    case 'raw-query':
      return SOURCE_ADAPTERS['raw-query'].produce(request, context);
    case 'json-query':
      return SOURCE_ADAPTERS['json-query'].produce(request, context);
    case 'procedural-json':
      return SOURCE_ADAPTERS['procedural-json'].produce(request, context);
    case 'static-json':
      return SOURCE_ADAPTERS['static-json'].produce(request, context);
  }
}
