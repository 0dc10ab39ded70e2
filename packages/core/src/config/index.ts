// packages/core/src/config/index.ts -- barrel re-export

export { createDefaultConfig, defaultConfigPath, resolveDefaultDirectory } from './defaults.js';
export { sweepConfigSchema, validateConfig } from './schema.js';
export type { SweepConfigInput } from './schema.js';
export { loadConfig, writeConfig, expandHome } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
export { createExcludeFilter, isExcluded } from './ignore.js';
