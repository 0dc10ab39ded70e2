// packages/core/src/deletion/index.ts -- barrel re-export

export { executeDeletions, isDirectChildName, NOT_FOUND_REASON, OUTSIDE_DIRECTORY_REASON, treeSize } from './executor.js';
