/**
 * Parses `vendor/package` identifiers.
 */
import { InvalidPackageNameError } from '../../utils/errors.js';
import type { PackageIdentity } from './types.js';

/**
 * Split an identifier on `/` into vendor and package name.
 * Exactly two non-empty parts are required; no other validation is done.
 */
export function resolvePackageName(identifier: string): PackageIdentity {
  const parts = identifier.split('/');

  if (parts.length !== 2) {
    throw new InvalidPackageNameError(identifier);
  }

  const [vendor, name] = parts;
  if (!vendor || !name) {
    throw new InvalidPackageNameError(identifier);
  }

  return Object.freeze({ vendor, name });
}
