// packages/core/src/suppression/index.ts -- barrel re-export

export { SuppressionStore } from './suppression-store.js';
export type { SuppressionStoreOptions } from './suppression-store.js';
export { filterSuppressed } from './filter.js';
