import React, { useEffect, useState } from 'react';
import { inject } from '@vercel/analytics';
import { Calculator } from './components/Calculator';
import ErrorBoundary from './components/ErrorBoundary';
import { appConfig } from './config';
import { EntryStore } from './utils/entryStore';
import { readRecipeFromHash } from './utils/shareLink';
import './App.css';

// A recipe restored from the link, or one empty item to start typing into.
export function createInitialStore(hash: string): EntryStore {
  const shared = readRecipeFromHash(hash);
  return new EntryStore({
    recipeName: shared?.name ?? '',
    entries: shared && shared.entries.length > 0 ? shared.entries : [{}],
  });
}

function App() {
  const [store] = useState(() => createInitialStore(window.location.hash));

  useEffect(() => {
    if (appConfig.analyticsEnabled) {
      inject();
    }
  }, []);

  return (
    <ErrorBoundary>
      <div className="app">
        <Calculator store={store} precision={appConfig.displayPrecision} />
      </div>
    </ErrorBoundary>
  );
}

export default App;
