/**
 * In-process filesystem. Backs dry runs and tests.
 */
import { FilesystemError } from '../../utils/errors.js';
import { normalizeTargetPath, parentDirectories } from './paths.js';
import type { TargetFilesystem, WriteOptions } from './types.js';

export class MemoryFilesystem implements TargetFilesystem {
  private files = new Map<string, string>();
  private directories = new Set<string>(['']);

  async exists(target: string): Promise<boolean> {
    const key = normalizeTargetPath(target);
    return this.files.has(key) || this.directories.has(key);
  }

  async createDirectory(target: string): Promise<void> {
    const key = normalizeTargetPath(target);
    this.ensureDirectory(key, 'createDirectory');
  }

  async readFile(target: string): Promise<string> {
    const key = normalizeTargetPath(target);
    const content = this.files.get(key);
    if (content === undefined) {
      throw new FilesystemError(`File not found: ${key}`, { operation: 'readFile', path: key });
    }
    return content;
  }

  async writeFile(target: string, content: string, options: WriteOptions = {}): Promise<void> {
    const key = normalizeTargetPath(target);
    this.assertWritable(key, 'writeFile', options);
    this.ensureParents(key, 'writeFile');
    this.files.set(key, content);
  }

  async renameFile(from: string, to: string, options: WriteOptions = {}): Promise<void> {
    const source = normalizeTargetPath(from);
    const destination = normalizeTargetPath(to);
    const content = this.files.get(source);

    if (content === undefined) {
      throw new FilesystemError(`File not found: ${source}`, { operation: 'renameFile', path: source });
    }
    this.assertWritable(destination, 'renameFile', options);
    this.ensureParents(destination, 'renameFile');

    this.files.delete(source);
    this.files.set(destination, content);
  }

  /**
   * All file paths, sorted.
   */
  listFiles(): string[] {
    return [...this.files.keys()].sort();
  }

  private assertWritable(key: string, operation: string, options: WriteOptions): void {
    if (key === '' || this.directories.has(key)) {
      throw new FilesystemError(`Path is a directory: ${key}`, { operation, path: key });
    }
    if (this.files.has(key) && !options.overwrite) {
      throw new FilesystemError(`File already exists: ${key}`, { operation, path: key });
    }
  }

  private ensureParents(key: string, operation: string): void {
    for (const dir of parentDirectories(key)) {
      this.ensureDirectory(dir, operation);
    }
  }

  private ensureDirectory(key: string, operation: string): void {
    for (const dir of [...parentDirectories(key), key]) {
      if (this.files.has(dir)) {
        throw new FilesystemError(`Not a directory: ${dir}`, { operation, path: dir });
      }
      this.directories.add(dir);
    }
  }
}
