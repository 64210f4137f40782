/**
 * Store Composer
 *
 * Registry of store capabilities. Backends register the contracts they
 * implement; the upload routes look up the one they need per request.
 * Wiring happens once at startup and any invalid registration is fatal.
 */

import type { Capability, CapabilityMap } from '../types/index.js';

export class StoreComposerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreComposerError';
  }
}

/**
 * StoreComposer interface
 */
export interface StoreComposer {
  register<K extends Capability>(
    capability: K,
    implementation: CapabilityMap[K] | null | undefined
  ): void;
  get<K extends Capability>(capability: K): CapabilityMap[K] | undefined;
  has(capability: Capability): boolean;
  require<K extends Capability>(capability: K): CapabilityMap[K];
  /** Operator-facing summary, e.g. `Core: ✓ Terminater: ✓ Quota: ✗` */
  capabilities(): string;
}

const REQUIRED_METHODS: {
  [K in Capability]: ReadonlyArray<keyof CapabilityMap[K]>;
} = {
  core: ['create', 'writeChunk', 'getInfo', 'read'],
  terminater: ['terminate'],
  quota: ['usage'],
};

const CAPABILITY_LABELS: Record<Capability, string> = {
  core: 'Core',
  terminater: 'Terminater',
  quota: 'Quota',
};

const CAPABILITY_ORDER: readonly Capability[] = ['core', 'terminater', 'quota'];

/**
 * Create an empty StoreComposer
 */
export function createStoreComposer(): StoreComposer {
  const registry: Partial<CapabilityMap> = {};

  return {
    register(capability, implementation) {
      const label = CAPABILITY_LABELS[capability];
      if (implementation === null || implementation === undefined) {
        throw new StoreComposerError(
          `Cannot register an empty ${label} implementation`
        );
      }

      const missing = REQUIRED_METHODS[capability].filter(
        (method) => typeof implementation[method] !== 'function'
      );
      if (missing.length > 0) {
        throw new StoreComposerError(
          `${label} implementation is missing: ${missing.map(String).join(', ')}`
        );
      }

      registry[capability] = implementation;
    },

    get(capability) {
      return registry[capability];
    },

    has(capability) {
      return registry[capability] !== undefined;
    },

    require(capability) {
      const implementation = registry[capability];
      if (implementation === undefined) {
        throw new StoreComposerError(
          `No ${CAPABILITY_LABELS[capability]} implementation registered`
        );
      }
      return implementation;
    },

    capabilities() {
      return CAPABILITY_ORDER.map(
        (capability) =>
          `${CAPABILITY_LABELS[capability]}: ${registry[capability] === undefined ? '✗' : '✓'}`
      ).join(' ');
    },
  };
}
