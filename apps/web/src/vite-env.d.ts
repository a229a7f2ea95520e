/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DEBUG_LOGS?: string
  readonly VITE_DEBUG?: string
  readonly VITE_SECONDS_PER_GRAIN?: string
  readonly VITE_MAX_GRAINS_PER_TICK?: string
  readonly VITE_SPAWN_POLICY?: string
  readonly VITE_SAND_SEED?: string
  readonly VITE_TICK_INTERVAL_MS?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
