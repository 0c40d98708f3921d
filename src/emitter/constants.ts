/**
 * Local names used inside the isolated scope of an emitted fragment.
 *
 * They live in the IIFE's function scope (or the helper's), so they never
 * reach the page's global namespace.
 */
export const HELPER_NAMES = {
  helper: 'createNestedObject',
  root: 'root',
  path: 'path',
  segments: 'segments',
  i: 'i',
  segment: 'segment',
  container: 'container',
  key: 'key'
} as const;

/**
 * Base name of the payload placeholder identifier; see `choosePayloadSentinel`.
 */
export const PAYLOAD_SENTINEL_BASE = '__loadJsonObjectPayload__';

export const DEFAULT_SHARED_HELPER_NAME = '__loadJsonObjectCreateNestedObject';

export const DEFAULT_CHUNK_SIZE = 4000;
