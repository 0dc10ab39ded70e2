// packages/core/src/engine/index.ts -- barrel re-export

export { EventBus } from './event-bus.js';
export { runSession } from './session-runner.js';
export type { SessionDependencies, SessionReport } from './session-runner.js';
export { writeSuggestionArtifact } from './artifact.js';
