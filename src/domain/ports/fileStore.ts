// Port: File Store
// JSON document storage used by the exchange, the namer and the orchestrator

export interface FileStorePort {
  /**
   * Replace the document at filePath in a single rename; readers see old or new, never a mix
   */
  writeAtomic(filePath: string, doc: unknown): Promise<void>;

  /**
   * Rewrite the document at filePath while holding a per-path lock
   */
  writeExclusive(filePath: string, doc: unknown): Promise<void>;

  /**
   * Parse the document at filePath. Throws NotFoundError or DecodeError.
   */
  read(filePath: string): Promise<unknown>;

  exists(filePath: string): Promise<boolean>;

  /**
   * Names of the immediate subdirectories of dirPath, sorted; empty when dirPath is absent
   */
  listDirectories(dirPath: string): Promise<string[]>;

  /**
   * Delete a file or a directory tree. Missing paths are ignored.
   */
  remove(targetPath: string): Promise<void>;
}
