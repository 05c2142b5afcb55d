/**
 * Tests for package name resolution.
 */
import { describe, it, expect } from 'vitest';
import { resolvePackageName } from '../../../../src/core/package/resolver.js';
import { InvalidPackageNameError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('resolvePackageName', () => {
  it('should split vendor and package name', () => {
    expect(resolvePackageName('dummy/dummy-package')).toEqual({
      vendor: 'dummy',
      name: 'dummy-package',
    });
  });

  it('should keep the original casing', () => {
    expect(resolvePackageName('Acme/Blog-Tools')).toEqual({ vendor: 'Acme', name: 'Blog-Tools' });
  });

  it('should return a frozen identity', () => {
    expect(Object.isFrozen(resolvePackageName('dummy/dummy-package'))).toBe(true);
  });

  it('should reject more than one separator', () => {
    expect(() => resolvePackageName('dummy/dummy-package/asdf')).toThrow(InvalidPackageNameError);
  });

  it('should reject a missing separator', () => {
    expect(() => resolvePackageName('dummy-package')).toThrow(InvalidPackageNameError);
  });

  it.each(['/dummy-package', 'dummy/', '/', ''])('should reject empty parts in "%s"', (identifier) => {
    expect(() => resolvePackageName(identifier)).toThrow(InvalidPackageNameError);
  });

  it('should carry the identifier in the error', () => {
    try {
      resolvePackageName('a/b/c');
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPackageNameError);
      if (error instanceof InvalidPackageNameError) {
        expect(error.code).toBe(ErrorCodes.INVALID_PACKAGE_NAME);
        expect(error.details).toEqual({ identifier: 'a/b/c' });
      }
    }
  });

  it('should not validate characters', () => {
    expect(resolvePackageName('ven dor/pack_age!')).toEqual({ vendor: 'ven dor', name: 'pack_age!' });
  });
});
