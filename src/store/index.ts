/**
 * Event store factory
 */

import type { IEventStore, StoreConfig, StoreType } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { createGoogleStore } from './google/index.js';
import { createMemoryStore } from './memory/index.js';

// Re-export base class and backends
export { BaseEventStore } from './base.js';
export { GoogleEventStore, createGoogleStore } from './google/index.js';
export type { GoogleStoreOptions } from './google/index.js';
export { MemoryEventStore, createMemoryStore } from './memory/index.js';
export type { MemoryStoreOptions } from './memory/index.js';

/**
 * Store factory function type
 */
export type StoreFactory<C extends StoreConfig> = (config: C, logger?: Logger) => IEventStore;

type FactoryMap = { [T in StoreType]: StoreFactory<Extract<StoreConfig, { type: T }>> };

const factories: FactoryMap = {
  google: createGoogleStore,
  memory: createMemoryStore,
};

/**
 * Create the store backend selected by configuration
 */
export function createEventStore(config: StoreConfig, logger?: Logger): IEventStore {
  switch (config.type) {
    case 'google':
      return factories.google(config, logger);
    case 'memory':
      return factories.memory(config, logger);
  }
}

/**
 * Singleton store instance
 */
let storeInstance: IEventStore | null = null;

/**
 * Get the process-wide store, connecting it on first use
 */
export async function getEventStore(config: StoreConfig, logger?: Logger): Promise<IEventStore> {
  if (!storeInstance) {
    const store = createEventStore(config, logger);
    await store.connect();
    storeInstance = store;
  }
  return storeInstance;
}

/**
 * Disconnect and forget the store singleton
 */
export async function resetEventStore(): Promise<void> {
  if (storeInstance) {
    await storeInstance.disconnect();
    storeInstance = null;
  }
}
