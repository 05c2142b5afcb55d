import { z } from 'zod';

/**
 * Helper to create an optional object with schema defaults.
 * Both undefined and null (an empty YAML document) become {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** What to do when the license option names no known license. */
export const UnknownLicensePolicySchema = z.enum(['error', 'skip']);

/** Options for one generation run. */
export const GenerationOptionsSchema = z.object({
  /** Generate into an existing package directory, overwriting files */
  force: z.boolean().default(false),
  /** Do not generate config/<package>.php */
  skipConfig: z.boolean().default(false),
  /** License name; empty writes an empty LICENSE file */
  license: z.string().default(''),
  onUnknownLicense: UnknownLicensePolicySchema.default('error'),
});

/** Project config file (.stubsmith.yaml). */
export const ProjectConfigSchema = withDefaults(
  z.object({
    license: z.string().optional(),
    skip_config: z.boolean().optional(),
    /** Directory new packages are created in, relative to the project root */
    destination: z.string().optional(),
    /** Directory holding a replacement template set */
    templates: z.string().optional(),
    unknown_license: UnknownLicensePolicySchema.optional(),
  })
);

export type UnknownLicensePolicy = z.infer<typeof UnknownLicensePolicySchema>;
export type GenerationOptions = z.infer<typeof GenerationOptionsSchema>;
export type GenerationOptionsInput = z.input<typeof GenerationOptionsSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
