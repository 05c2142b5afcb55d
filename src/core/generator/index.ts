/**
 * Generator exports barrel file.
 */
export { PackageGenerator, assertDestinationAvailable } from './generator.js';
export type {
  GenerationResult,
  LicenseSelection,
  PackageGeneratorDependencies,
} from './generator.js';
export { FileMaterializer, STAGING_SUFFIX } from './materializer.js';
export { GENERATION_PLAN, GENERATION_STAGES, plannedFiles } from './plan.js';
export type { GenerationStage, PlannedFile } from './plan.js';
