/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_SERVICE_WORKER_URL?: string;
  readonly VITE_COMPLETION_ENDPOINT?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
