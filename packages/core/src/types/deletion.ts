// packages/core/src/types/deletion.ts

export interface DeletionFailure {
  filename: string;
  reason: string;
}

/** Result of one deletion pass. `deleted` and `failed` never share a filename. */
export interface DeletionOutcome {
  deleted: string[];
  failed: DeletionFailure[];
  bytesFreed: number;
}
