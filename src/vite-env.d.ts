/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DISPLAY_PRECISION?: string
  readonly VITE_ENABLE_ANALYTICS?: string
  readonly VITE_DEBUG_RECOMPUTE?: string
}
