import { getEventBus } from '@kitchenflow/core';
import type { EventBus } from '@kitchenflow/core';
import type { KitchenStore } from './store/types';
import type { StationDirectory } from './stations';
import type { SettingsProvider } from './settings';

/** Collaborators every kitchen command and query runs against. */
export interface KdsRuntime {
  store: KitchenStore;
  stations: StationDirectory;
  settings: SettingsProvider;
  /** Defaults to the process-wide bus from `getEventBus()`. */
  bus?: EventBus;
}

let runtime: KdsRuntime | null = null;

export function configureKds(next: KdsRuntime): void {
  runtime = next;
}

export function getKds(): KdsRuntime {
  if (!runtime) {
    throw new Error('KDS runtime not configured. Call configureKds() at startup.');
  }
  return runtime;
}

export function getKdsBus(): EventBus {
  return getKds().bus ?? getEventBus();
}

/** Test helper. */
export function resetKds(): void {
  runtime = null;
}
