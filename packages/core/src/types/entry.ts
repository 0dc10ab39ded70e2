// packages/core/src/types/entry.ts — Directory snapshot types

/** One scanned entry of the target directory. */
export interface EntryRecord {
  /** Exact entry name; the join key for suppression, suggestions and deletion. */
  name: string;
  absolutePath: string;
  sizeBytes: number;
  modifiedAt: Date;
  /** Lowercase suffix including the dot (".dmg"), empty when there is none. */
  extension: string;
  isDirectory: boolean;
}

/** An entry left out of the snapshot because its metadata could not be read. */
export interface ScanWarning {
  name: string;
  message: string;
}

export interface Snapshot {
  directory: string;
  records: EntryRecord[];
  warnings: ScanWarning[];
}
