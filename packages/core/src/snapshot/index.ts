// packages/core/src/snapshot/index.ts -- barrel re-export

export { buildSnapshot } from './snapshot-builder.js';
export type { BuildSnapshotOptions } from './snapshot-builder.js';
