/**
 * Package identity exports barrel file.
 */
export { resolvePackageName } from './resolver.js';
export { buildPackageMetadata, kebabToCapitalize, capitalize } from './metadata.js';
export { METADATA_TOKENS } from './types.js';
export type { PackageIdentity, PackageMetadata, MetadataToken } from './types.js';
