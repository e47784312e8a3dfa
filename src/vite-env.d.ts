/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_AMPLITUDE_API_KEY?: string;
  readonly VITE_ASSESSMENT_VARIANT?: string;
  readonly VITE_SCORING_MODE?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
