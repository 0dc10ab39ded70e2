// packages/core/src/engine/session-runner.ts — One scan → suggest → confirm → delete → keep cycle

import type { Ignore } from 'ignore';
import type { Advisor } from '../advisory/advisory-client.js';
import { ConfirmationController } from '../confirmation/controller.js';
import type { Prompter } from '../confirmation/prompter.js';
import { executeDeletions } from '../deletion/executor.js';
import { buildSnapshot } from '../snapshot/snapshot-builder.js';
import { filterSuppressed } from '../suppression/filter.js';
import type { SuppressionStore } from '../suppression/suppression-store.js';
import type { DeletionFailure, DeletionOutcome } from '../types/deletion.js';
import type { EntryRecord, ScanWarning } from '../types/entry.js';
import type { SuggestionBatch } from '../types/suggestion.js';
import { ARTIFACT_FILENAME } from '../utils/constants.js';
import { SuppressionWriteError, errorMessage } from '../utils/errors.js';
import { generateSessionId } from '../utils/id.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { writeSuggestionArtifact } from './artifact.js';
import { EventBus } from './event-bus.js';

export interface SessionDependencies {
  directory: string;
  store: SuppressionStore;
  advisor: Advisor;
  prompter: Prompter;
  bus?: EventBus;
  logger?: Logger;
  /** File name of the suggestion dump; also left out of the scan. */
  artifactName?: string;
  exclude?: Ignore;
}

export interface SessionReport {
  sessionId: string;
  directory: string;
  scanned: number;
  warnings: ScanWarning[];
  /** Entries of this snapshot hidden by the suppression list. */
  filteredOut: number;
  analyzed: number;
  /** Suggestions that refer to an entry the advisor was shown. */
  batch: SuggestionBatch | null;
  unmatched: string[];
  /** Suggested names never offered to the operator: kept, excluded or not scanned. */
  withheld: string[];
  artifactPath: string | null;
  selected: string[];
  confirmed: boolean;
  deletion: DeletionOutcome | null;
  kept: string[];
  alreadyKept: string[];
  keepFailures: DeletionFailure[];
  durationMs: number;
}

/**
 * Run one session against `deps.directory`.
 *
 * DirectoryUnavailableError, AdvisoryUnavailableError and
 * AdvisoryResponseMalformedError propagate to the caller. All of them are
 * raised before anything is deleted or written to the suppression store.
 *
 * Keep decisions are collected after the deletion step over the full batch,
 * whatever the deletion outcome. An entry both deleted and kept is recorded
 * in both places.
 */
export async function runSession(deps: SessionDependencies): Promise<SessionReport> {
  const sessionId = generateSessionId();
  const startedAt = Date.now();
  const bus = deps.bus ?? new EventBus();
  const log = deps.logger ?? createSilentLogger();
  const artifactName = deps.artifactName ?? ARTIFACT_FILENAME;
  const stamp = (): string => new Date().toISOString();

  const report: SessionReport = {
    sessionId,
    directory: deps.directory,
    scanned: 0,
    warnings: [],
    filteredOut: 0,
    analyzed: 0,
    batch: null,
    unmatched: [],
    withheld: [],
    artifactPath: null,
    selected: [],
    confirmed: false,
    deletion: null,
    kept: [],
    alreadyKept: [],
    keepFailures: [],
    durationMs: 0,
  };

  const finish = (): SessionReport => {
    report.durationMs = Date.now() - startedAt;
    bus.emitEvent({ type: 'session.completed', sessionId, durationMs: report.durationMs, timestamp: stamp() });
    return report;
  };

  bus.emitEvent({ type: 'session.started', sessionId, directory: deps.directory, timestamp: stamp() });

  // ── Scan ──
  const snapshot = await buildSnapshot(deps.directory, {
    exclude: deps.exclude,
    skipNames: [artifactName],
    logger: log.child('scan'),
  });
  report.directory = snapshot.directory;
  report.scanned = snapshot.records.length;
  report.warnings = snapshot.warnings;
  bus.emitEvent({
    type: 'scan.completed',
    directory: snapshot.directory,
    entries: snapshot.records.length,
    totalBytes: snapshot.records.reduce((sum, record) => sum + record.sizeBytes, 0),
    warnings: snapshot.warnings,
    timestamp: stamp(),
  });
  if (snapshot.records.length === 0) return finish();

  // ── Suppression filter ──
  const suppressed = await deps.store.load();
  const candidates = filterSuppressed(snapshot.records, suppressed);
  report.filteredOut = snapshot.records.length - candidates.length;
  report.analyzed = candidates.length;
  bus.emitEvent({
    type: 'suppression.applied',
    suppressed: suppressed.size,
    filteredOut: report.filteredOut,
    remaining: candidates.length,
    timestamp: stamp(),
  });
  if (candidates.length === 0) return finish();

  // ── Advisory ──
  bus.emitEvent({ type: 'advisory.started', model: deps.advisor.model, entries: candidates.length, timestamp: stamp() });
  const advice = await deps.advisor.suggest(candidates);
  const { batch, withheld } = restrictToCandidates(advice.batch, candidates);
  report.batch = batch;
  report.unmatched = advice.unmatched;
  report.withheld = withheld;
  if (withheld.length > 0) {
    log.warn(`Withheld ${withheld.length} suggestion(s) for entries that were not analyzed: ${withheld.join(', ')}`);
  }
  bus.emitEvent({
    type: 'advisory.completed',
    batch,
    withheld,
    durationMs: advice.durationMs,
    timestamp: stamp(),
  });

  try {
    report.artifactPath = await writeSuggestionArtifact(snapshot.directory, artifactName, advice.payload);
    bus.emitEvent({ type: 'artifact.written', path: report.artifactPath, timestamp: stamp() });
  } catch (err) {
    log.warn(`Could not save suggestions: ${errorMessage(err)}`);
    bus.emitEvent({ type: 'artifact.failed', path: artifactName, error: errorMessage(err), timestamp: stamp() });
  }

  if (batch.suggestions.length === 0) {
    bus.emitEvent({ type: 'deletion.skipped', reason: 'no-suggestions', timestamp: stamp() });
    return finish();
  }

  // ── Delete (gated) ──
  const controller = new ConfirmationController(deps.prompter);
  report.selected = await controller.chooseDeletions(batch);
  if (report.selected.length === 0) {
    bus.emitEvent({ type: 'deletion.skipped', reason: 'nothing-selected', timestamp: stamp() });
  } else {
    report.confirmed = await controller.confirmDeletion(report.selected);
    if (report.confirmed) {
      report.deletion = await executeDeletions(report.selected, snapshot.directory, { logger: log.child('delete') });
      bus.emitEvent({ type: 'deletion.completed', outcome: report.deletion, timestamp: stamp() });
    } else {
      bus.emitEvent({ type: 'deletion.skipped', reason: 'declined', timestamp: stamp() });
    }
  }

  // ── Keep write-back ──
  const keeps = await controller.chooseKeeps(batch);
  if (keeps.length > 0) {
    for (const filename of keeps) {
      try {
        const result = await deps.store.add(filename);
        (result.added ? report.kept : report.alreadyKept).push(filename);
      } catch (err) {
        if (!(err instanceof SuppressionWriteError)) throw err;
        log.warn(err.message);
        report.keepFailures.push({ filename, reason: err.message });
      }
    }
    bus.emitEvent({
      type: 'keep.recorded',
      added: report.kept,
      alreadyKept: report.alreadyKept,
      failures: report.keepFailures,
      timestamp: stamp(),
    });
  }

  return finish();
}

/**
 * Keep only suggestions naming an entry that was sent to the advisor. Kept,
 * excluded and unscanned names never reach the pickers or the executor.
 */
function restrictToCandidates(
  batch: SuggestionBatch,
  candidates: readonly EntryRecord[],
): { batch: SuggestionBatch; withheld: string[] } {
  const analyzed = new Set(candidates.map((record) => record.name));
  const withheld = batch.suggestions.map((s) => s.filename).filter((filename) => !analyzed.has(filename));
  if (withheld.length === 0) return { batch, withheld };
  return {
    batch: { ...batch, suggestions: batch.suggestions.filter((s) => analyzed.has(s.filename)) },
    withheld,
  };
}
