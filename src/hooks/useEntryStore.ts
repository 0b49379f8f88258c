import { useSyncExternalStore } from 'react';
import type { EntryStore, StoreSnapshot } from '../utils/entryStore';

/**
 * Re-renders the caller after every store mutation. Derived values are read from the
 * store during render; they are recomputed on read, so they are never stale.
 */
export function useEntryStore(store: EntryStore): StoreSnapshot {
  return useSyncExternalStore(store.subscribe, store.getSnapshot, store.getSnapshot);
}
