/**
 * Configuration exports barrel file.
 */
export {
  loadProjectConfig,
  getDefaultProjectConfig,
  getConfigPath,
  parseGenerationOptions,
  resolveGenerationOptions,
  CONFIG_FILE_NAME,
} from './loader.js';
export {
  GenerationOptionsSchema,
  ProjectConfigSchema,
  UnknownLicensePolicySchema,
} from './schema.js';
export type {
  GenerationOptions,
  GenerationOptionsInput,
  ProjectConfig,
  UnknownLicensePolicy,
} from './schema.js';
