/**
 * Tests for the on-disk target filesystem.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync, existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { LocalFilesystem } from '../../../../src/core/filesystem/local.js';
import { FilesystemError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('LocalFilesystem', () => {
  let tempDir: string;
  let fs: LocalFilesystem;

  beforeEach(() => {
    tempDir = join(tmpdir(), `stubsmith-local-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    fs = new LocalFilesystem(tempDir);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should resolve target paths below the root', () => {
    expect(fs.resolve('/pkg/README.md')).toBe(join(tempDir, 'pkg', 'README.md'));
    expect(fs.resolve('')).toBe(tempDir);
  });

  it('should report existence', async () => {
    writeFileSync(join(tempDir, 'present.txt'), 'x');

    expect(await fs.exists('present.txt')).toBe(true);
    expect(await fs.exists('absent.txt')).toBe(false);
  });

  it('should create nested directories', async () => {
    await fs.createDirectory('a/b');

    expect(existsSync(join(tempDir, 'a', 'b'))).toBe(true);
  });

  it('should write files and create parents', async () => {
    await fs.writeFile('pkg/database/.gitkeep', '');

    expect(readFileSync(join(tempDir, 'pkg', 'database', '.gitkeep'), 'utf-8')).toBe('');
  });

  it('should read files', async () => {
    writeFileSync(join(tempDir, 'file.txt'), 'hello');

    expect(await fs.readFile('file.txt')).toBe('hello');
  });

  it('should wrap read failures in FilesystemError', async () => {
    await expect(fs.readFile('missing.txt')).rejects.toMatchObject({
      name: 'FilesystemError',
      code: ErrorCodes.FILESYSTEM,
    });
  });

  it('should refuse to overwrite without the overwrite option', async () => {
    writeFileSync(join(tempDir, 'file.txt'), 'old');

    await expect(fs.writeFile('file.txt', 'new')).rejects.toThrow(
      `File already exists: ${join(tempDir, 'file.txt')}`
    );
    expect(readFileSync(join(tempDir, 'file.txt'), 'utf-8')).toBe('old');
  });

  it('should overwrite with the overwrite option', async () => {
    writeFileSync(join(tempDir, 'file.txt'), 'old');
    await fs.writeFile('file.txt', 'new', { overwrite: true });

    expect(readFileSync(join(tempDir, 'file.txt'), 'utf-8')).toBe('new');
  });

  describe('renameFile', () => {
    it('should rename a file', async () => {
      writeFileSync(join(tempDir, 'a.stub'), 'content');
      await fs.renameFile('a.stub', 'src/a.php');

      expect(existsSync(join(tempDir, 'a.stub'))).toBe(false);
      expect(readFileSync(join(tempDir, 'src', 'a.php'), 'utf-8')).toBe('content');
    });

    it('should refuse to replace an existing file without overwrite', async () => {
      writeFileSync(join(tempDir, 'a.stub'), 'new');
      writeFileSync(join(tempDir, 'a'), 'old');

      await expect(fs.renameFile('a.stub', 'a')).rejects.toThrow(FilesystemError);
      expect(readFileSync(join(tempDir, 'a'), 'utf-8')).toBe('old');
    });

    it('should replace an existing file with overwrite', async () => {
      writeFileSync(join(tempDir, 'a.stub'), 'new');
      writeFileSync(join(tempDir, 'a'), 'old');
      await fs.renameFile('a.stub', 'a', { overwrite: true });

      expect(readFileSync(join(tempDir, 'a'), 'utf-8')).toBe('new');
    });

    it('should fail when the source is missing', async () => {
      await expect(fs.renameFile('missing', 'target')).rejects.toThrow(
        `renameFile failed: ${join(tempDir, 'missing')}`
      );
    });
  });
});
