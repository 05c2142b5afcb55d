/**
 * Target filesystem exports barrel file.
 */
export { LocalFilesystem } from './local.js';
export { MemoryFilesystem } from './memory.js';
export { normalizeTargetPath, joinTargetPath } from './paths.js';
export type { TargetFilesystem, WriteOptions } from './types.js';
