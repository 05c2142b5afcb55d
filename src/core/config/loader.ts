import * as path from 'node:path';
import {
  GenerationOptionsSchema,
  ProjectConfigSchema,
  type GenerationOptions,
  type GenerationOptionsInput,
  type ProjectConfig,
} from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const CONFIG_FILE_NAME = '.stubsmith.yaml';

/**
 * Project config used when no config file exists.
 */
export function getDefaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, CONFIG_FILE_NAME);
}

/**
 * Load the project config file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadProjectConfig(
  projectRoot: string,
  configPath?: string
): Promise<ProjectConfig> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : getConfigPath(projectRoot);

  if (!(await fileExists(fullPath))) {
    return getDefaultProjectConfig();
  }

  return loadYamlWithSchema(fullPath, ProjectConfigSchema);
}

/**
 * Validate generation options and fill in defaults.
 */
export function parseGenerationOptions(input: unknown = {}): GenerationOptions {
  const result = GenerationOptionsSchema.safeParse(input ?? {});

  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.PARSE_ERROR,
      `Invalid generation options: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Merge config file values with explicit options.
 * Explicit options win over the file; the file wins over defaults.
 */
export function resolveGenerationOptions(
  config: ProjectConfig,
  explicit: GenerationOptionsInput = {}
): GenerationOptions {
  return parseGenerationOptions({
    force: explicit.force,
    skipConfig: explicit.skipConfig ?? config.skip_config,
    license: explicit.license ?? config.license,
    onUnknownLicense: explicit.onUnknownLicense ?? config.unknown_license,
  });
}
