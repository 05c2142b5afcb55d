/**
 * Target filesystem contract.
 */

export interface WriteOptions {
  /** Replace an existing file instead of failing. */
  overwrite?: boolean;
}

/**
 * The storage a package is generated into.
 *
 * Paths are POSIX-style and relative to the adapter's root. Every failure
 * surfaces as a FilesystemError.
 */
export interface TargetFilesystem {
  exists(path: string): Promise<boolean>;
  /** Create a directory and any missing parents. */
  createDirectory(path: string): Promise<void>;
  readFile(path: string): Promise<string>;
  /** Write a file, creating missing parent directories. */
  writeFile(path: string, content: string, options?: WriteOptions): Promise<void>;
  renameFile(from: string, to: string, options?: WriteOptions): Promise<void>;
}
