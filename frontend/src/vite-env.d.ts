/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_WORKBOOK_URL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
