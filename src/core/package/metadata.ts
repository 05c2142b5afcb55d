/**
 * Derives the substitution tokens for a package.
 */
import type { PackageIdentity, PackageMetadata } from './types.js';

/**
 * Uppercase the first character, leaving the rest untouched.
 */
export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Convert a kebab-case name to StudlyCase, e.g. `dummy-package` -> `DummyPackage`.
 * Whitespace breaks words the same way a hyphen does.
 */
export function kebabToCapitalize(value: string): string {
  return value.split(/[-\s]+/).map(capitalize).join('');
}

/**
 * Build the token mapping for an identity.
 *
 * `composerNamespace` doubles the namespace separator so the value can be
 * dropped into a JSON string literal.
 */
export function buildPackageMetadata(
  identity: PackageIdentity,
  now: Date = new Date()
): PackageMetadata {
  const vendorName = capitalize(identity.vendor);
  const studlyName = kebabToCapitalize(identity.name);

  return Object.freeze({
    namespace: `${vendorName}\\${studlyName}`,
    serviceProvider: `${studlyName}ServiceProvider`,
    packageName: identity.name,
    vendorName,
    fullPackageName: `${identity.vendor.toLowerCase()}/${identity.name.toLowerCase()}`,
    composerNamespace: `${vendorName}\\\\${studlyName}`,
    currentYear: String(now.getFullYear()),
  });
}
