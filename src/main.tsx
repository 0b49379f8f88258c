import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'

// Expose Vite's env object to `globalThis.importMeta` so the config module can read it
// without referencing `import.meta` (Jest compiles it to CommonJS).
Object.assign(globalThis, { importMeta: { env: import.meta.env } })

const rootElement = document.getElementById('root')
if (!rootElement) {
  throw new Error('Missing #root element')
}

// Loaded after the env is exposed: the config is read once, on import.
import('./App').then(({ default: App }) => {
  createRoot(rootElement).render(
    <StrictMode>
      <App />
    </StrictMode>,
  )
}).catch((error: unknown) => {
  console.error('Failed to start the calculator', error)
})
