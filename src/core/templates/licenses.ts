/**
 * Known license bodies, keyed by their lowercase option name.
 */
import type { TemplatePath } from './store.js';

export const LICENSES = {
  'mit': 'license/mit.stub',
  'apache 2.0': 'license/apache20.stub',
  'gnu gpl v3': 'license/gnu_gpl_v3.stub',
} as const satisfies Record<string, TemplatePath>;

export type LicenseName = keyof typeof LICENSES;

function isLicenseName(name: string): name is LicenseName {
  return Object.prototype.hasOwnProperty.call(LICENSES, name);
}

export const LICENSE_NAMES: readonly LicenseName[] = Object.keys(LICENSES).filter(isLicenseName);

/**
 * Find the template for a license name, ignoring case.
 * Returns undefined for names outside the known set.
 */
export function findLicenseTemplate(name: string): TemplatePath | undefined {
  const key = name.toLowerCase();
  return isLicenseName(key) ? LICENSES[key] : undefined;
}
