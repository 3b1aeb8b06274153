import type { SourceAdapter } from './sourceAdapter.js';
import { createVivaRealAdapter } from './vivareal.js';
import { createZapAdapter } from './zap.js';

export type { AdapterFetchOptions, AdapterResult, SourceAdapter } from './sourceAdapter.js';

const FACTORIES: Record<string, () => SourceAdapter> = {
  zap: createZapAdapter,
  vivareal: createVivaRealAdapter
};

export const KNOWN_ADAPTERS = Object.keys(FACTORIES);

/** Build the adapters named in configuration, in that order. */
export function createAdapters(names: string[]): SourceAdapter[] {
  return names.map((name) => {
    const factory = FACTORIES[name];
    if (!factory) {
      throw new Error(`Unknown adapter "${name}" (known: ${KNOWN_ADAPTERS.join(', ')})`);
    }
    return factory();
  });
}
