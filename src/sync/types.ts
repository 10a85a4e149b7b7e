/**
 * Device-side collaborators.
 *
 * Connection handling and the on-device document catalog live outside this
 * package; sync orchestration only depends on these interfaces.
 */

/** A connection to the device. */
export interface Transport {
  /** Run a shell command on the device and return its standard output. */
  runCommand(command: string): Promise<string>;
  upload(data: Uint8Array, remotePath: string): Promise<void>;
  download(remotePath: string): Promise<Uint8Array>;
  close(): Promise<void>;
}

export type DocumentFileType = 'pdf' | 'epub';

export interface CatalogEntry {
  id: string;
  /** Name shown on the device. */
  name: string;
  modifiedAt: Date;
}

/** The device's per-document metadata store. */
export interface Catalog {
  listDocuments(): Promise<CatalogEntry[]>;
  /**
   * Create catalog metadata for a new document.
   *
   * @returns The new document's id and the remote path its bytes go to.
   */
  registerDocument(name: string, fileType: DocumentFileType): Promise<{ id: string; path: string }>;
  /** Remote path of a document's PDF bytes. */
  documentPath(id: string): string;
  removeDocument(id: string): Promise<void>;
}

export interface SyncFailure {
  path: string;
  error: Error;
}

/** Outcome of a batch; one failed document never stops the others. */
export interface SyncReport {
  completed: string[];
  skipped: string[];
  failed: SyncFailure[];
}
