/**
 * Read-only access to the bundled template set.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { fileExists, readFile } from '../../utils/file-system.js';
import { TemplateNotFoundError } from '../../utils/errors.js';

/** Logical paths of every template the generator knows about. */
export const TEMPLATE_PATHS = [
  '.gitignore.stub',
  'CHANGELOG.md.stub',
  'README.md.stub',
  'config/config.php.stub',
  'license/mit.stub',
  'license/apache20.stub',
  'license/gnu_gpl_v3.stub',
  'src/PackageServiceProvider.php.stub',
  'tests/TestCase.php.stub',
  'phpunit.xml.stub',
  'composer.json.stub',
] as const;

export type TemplatePath = (typeof TEMPLATE_PATHS)[number];

/** The templates directory shipped beside src/ and dist/. */
export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL('../../../templates/', import.meta.url));

export function isTemplatePath(value: string): value is TemplatePath {
  return TEMPLATE_PATHS.some((known) => known === value);
}

/**
 * Template store backed by a directory on disk.
 * Only paths listed in TEMPLATE_PATHS can be read.
 */
export class TemplateStore {
  readonly templateDir: string;

  constructor(templateDir: string = DEFAULT_TEMPLATE_DIR) {
    this.templateDir = path.resolve(templateDir);
  }

  /**
   * Read the raw body of a template.
   */
  async read(logicalPath: string): Promise<string> {
    if (!isTemplatePath(logicalPath)) {
      throw new TemplateNotFoundError(logicalPath, { reason: 'unknown template' });
    }

    const fullPath = path.join(this.templateDir, logicalPath);
    try {
      return await readFile(fullPath);
    } catch (error) {
      throw new TemplateNotFoundError(logicalPath, {
        templateDir: this.templateDir,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * List known templates that are missing from the template directory.
   */
  async verify(): Promise<TemplatePath[]> {
    const missing: TemplatePath[] = [];
    for (const logicalPath of TEMPLATE_PATHS) {
      if (!(await fileExists(path.join(this.templateDir, logicalPath)))) {
        missing.push(logicalPath);
      }
    }
    return missing;
  }
}
