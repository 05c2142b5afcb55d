/**
 * Package identity and metadata type definitions.
 */

/**
 * A resolved `vendor/package` identifier. Both parts are non-empty.
 */
export interface PackageIdentity {
  readonly vendor: string;
  readonly name: string;
}

/** Token names available to `${token}` placeholders. */
export const METADATA_TOKENS = [
  'namespace',
  'serviceProvider',
  'packageName',
  'vendorName',
  'fullPackageName',
  'composerNamespace',
  'currentYear',
] as const;

export type MetadataToken = (typeof METADATA_TOKENS)[number];

/**
 * Substitution values for one generation run.
 */
export type PackageMetadata = Readonly<Record<MetadataToken, string>>;
