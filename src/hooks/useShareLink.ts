import { useEffect } from 'react';
import { buildRecipeHash } from '../utils/shareLink';
import type { StoreSnapshot } from '../utils/entryStore';

/**
 * Keeps the URL fragment in sync with the recipe so the address bar is always a share link.
 */
export function useShareLink(snapshot: StoreSnapshot): void {
  useEffect(() => {
    const targetHash = buildRecipeHash(snapshot.recipeName, snapshot.entries);
    if (window.location.hash === targetHash) {
      return;
    }
    // replaceState so every keystroke does not add a history entry
    window.history.replaceState(null, '', targetHash);
  }, [snapshot]);
}
