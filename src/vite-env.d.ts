/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DRAWER_PRESET?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
