/**
 * Target filesystem rooted at a directory on disk.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { FilesystemError } from '../../utils/errors.js';
import { normalizeTargetPath } from './paths.js';
import type { TargetFilesystem, WriteOptions } from './types.js';

export class LocalFilesystem implements TargetFilesystem {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Absolute on-disk path for a target path.
   */
  resolve(target: string): string {
    return path.join(this.root, normalizeTargetPath(target));
  }

  async exists(target: string): Promise<boolean> {
    try {
      await fs.promises.access(this.resolve(target), fs.constants.F_OK);
      return true;
    } catch { /* path not found */ }
    return false;
  }

  async createDirectory(target: string): Promise<void> {
    const fullPath = this.resolve(target);
    await this.run('createDirectory', fullPath, async () => {
      await fs.promises.mkdir(fullPath, { recursive: true });
    });
  }

  async readFile(target: string): Promise<string> {
    const fullPath = this.resolve(target);
    return this.run('readFile', fullPath, () => fs.promises.readFile(fullPath, 'utf-8'));
  }

  async writeFile(target: string, content: string, options: WriteOptions = {}): Promise<void> {
    const fullPath = this.resolve(target);
    await this.run('writeFile', fullPath, async () => {
      await fs.promises.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.promises.writeFile(fullPath, content, {
        encoding: 'utf-8',
        flag: options.overwrite ? 'w' : 'wx',
      });
    });
  }

  async renameFile(from: string, to: string, options: WriteOptions = {}): Promise<void> {
    const source = this.resolve(from);
    const destination = this.resolve(to);

    if (!options.overwrite && (await this.exists(to))) {
      throw new FilesystemError(`File already exists: ${destination}`, {
        operation: 'renameFile',
        path: destination,
      });
    }

    await this.run('renameFile', source, async () => {
      await fs.promises.mkdir(path.dirname(destination), { recursive: true });
      await fs.promises.rename(source, destination);
    });
  }

  /**
   * Run an fs call, converting Node errors to FilesystemError.
   */
  private async run<T>(operation: string, fullPath: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const code = isErrnoException(error) ? error.code : undefined;
      const reason = code === 'EEXIST' ? 'File already exists' : `${operation} failed`;
      throw new FilesystemError(`${reason}: ${fullPath}`, {
        operation,
        path: fullPath,
        code,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
