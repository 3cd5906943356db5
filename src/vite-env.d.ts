/// <reference types="vite/client" />

// Injected by vite.config.ts
declare const __VERBOSE_LOGS__: boolean
