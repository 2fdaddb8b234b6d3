/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_MODEL_URL?: string
  readonly VITE_MODEL_INPUT_SIZE?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
