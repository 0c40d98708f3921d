import type { SourceAdapter } from './types';

/**
 * Returns the design-time JSON text unmodified.
 */
export const staticJsonAdapter: SourceAdapter<'static-json'> = {
  source: 'static-json',

  async produce(request) {
    return request.staticText;
  }
};
