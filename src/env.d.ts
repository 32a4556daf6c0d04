/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_CAPTION_OFFSET_SECONDS?: string;
  readonly VITE_CLEAR_CAPTIONS_IN_GAPS?: string;
}
