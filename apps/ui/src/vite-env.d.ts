/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_SHROOMBOX_MODE?: string;
  readonly VITE_SHROOMBOX_API_BASE?: string;
  readonly VITE_SHROOMBOX_LOG_CAPACITY?: string;
  readonly VITE_SHROOMBOX_REQUEST_TIMEOUT_MS?: string;
  readonly VITE_SHROOMBOX_STATUS_POLL_MS?: string;
  readonly VITE_SHROOMBOX_STREAM_IDLE_MS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
