/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  StubsmithError,
  InvalidPackageNameError,
  DirectoryAlreadyExistsError,
  TemplateNotFoundError,
  FilesystemError,
  UnknownLicenseError,
  ConfigError,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('StubsmithError', () => {
  it('should create error with code and message', () => {
    const error = new StubsmithError('G001', 'Test error message');

    expect(error.code).toBe('G001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('StubsmithError');
  });

  it('should be instance of Error', () => {
    const error = new StubsmithError('G001', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error.stack).toBeDefined();
  });

  describe('toJSON', () => {
    it('should serialize error to JSON', () => {
      const error = new StubsmithError('G004', 'Test error', { key: 'value' });

      expect(error.toJSON()).toEqual({
        name: 'StubsmithError',
        code: 'G004',
        message: 'Test error',
        details: { key: 'value' },
      });
    });

    it('should handle undefined details', () => {
      expect(new StubsmithError('G004', 'Test').toJSON().details).toBeUndefined();
    });
  });
});

describe('generation errors', () => {
  it('should describe an invalid package name', () => {
    const error = new InvalidPackageNameError('a/b/c');

    expect(error).toBeInstanceOf(StubsmithError);
    expect(error.name).toBe('InvalidPackageNameError');
    expect(error.code).toBe(ErrorCodes.INVALID_PACKAGE_NAME);
    expect(error.message).toBe('The given package name is not valid: "a/b/c". Expected "vendor/package".');
  });

  it('should describe an existing directory', () => {
    const error = new DirectoryAlreadyExistsError('dummy-package');

    expect(error.name).toBe('DirectoryAlreadyExistsError');
    expect(error.code).toBe(ErrorCodes.DIRECTORY_EXISTS);
    expect(error.details).toEqual({ path: 'dummy-package' });
  });

  it('should merge template details', () => {
    const error = new TemplateNotFoundError('x.stub', { reason: 'unknown template' });

    expect(error.name).toBe('TemplateNotFoundError');
    expect(error.code).toBe(ErrorCodes.TEMPLATE_NOT_FOUND);
    expect(error.details).toEqual({ templatePath: 'x.stub', reason: 'unknown template' });
  });

  it('should create filesystem errors', () => {
    const error = new FilesystemError('disk full', { path: 'a' });

    expect(error.name).toBe('FilesystemError');
    expect(error.code).toBe(ErrorCodes.FILESYSTEM);
  });

  it('should list known licenses', () => {
    const error = new UnknownLicenseError('wtfpl', ['mit', 'apache 2.0']);

    expect(error.name).toBe('UnknownLicenseError');
    expect(error.code).toBe(ErrorCodes.UNKNOWN_LICENSE);
    expect(error.message).toBe('Unknown license "wtfpl". Known licenses: mit, apache 2.0');
  });

  it('should create config errors with any code', () => {
    const error = new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, 'Config error', { path: '.stubsmith.yaml' });

    expect(error.name).toBe('ConfigError');
    expect(error.code).toBe('C001');
    expect(error.details).toEqual({ path: '.stubsmith.yaml' });
  });
});

describe('ErrorCodes', () => {
  it('should have unique codes', () => {
    const codes = Object.values(ErrorCodes);

    expect(new Set(codes).size).toBe(codes.length);
  });
});
