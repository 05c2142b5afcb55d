/**
 * Generates a package directory from the template set.
 *
 * Stages run strictly in order: base files, config, license, service
 * provider, test scaffold, manifest. Generation stops at the first error and
 * leaves files from completed stages on disk.
 */
import type { TargetFilesystem, WriteOptions } from '../filesystem/types.js';
import { joinTargetPath } from '../filesystem/paths.js';
import { TemplateStore, type TemplatePath } from '../templates/store.js';
import { renderTemplate } from '../templates/substitute.js';
import { findLicenseTemplate, LICENSE_NAMES } from '../templates/licenses.js';
import { resolvePackageName } from '../package/resolver.js';
import { buildPackageMetadata } from '../package/metadata.js';
import type { PackageIdentity, PackageMetadata } from '../package/types.js';
import { parseGenerationOptions } from '../config/loader.js';
import type { GenerationOptions, GenerationOptionsInput } from '../config/schema.js';
import { FileMaterializer } from './materializer.js';
import {
  plannedFiles,
  GENERATION_STAGES,
  DATABASE_MARKER,
  LICENSE_FILE,
  TESTS_DIRECTORY,
  type GenerationStage,
} from './plan.js';
import { DirectoryAlreadyExistsError, UnknownLicenseError } from '../../utils/errors.js';
import { logger, type Logger } from '../../utils/logger.js';

/**
 * Collaborators that can be swapped out, mostly for tests.
 */
export interface PackageGeneratorDependencies {
  templates?: TemplateStore;
  /** Clock used for `currentYear` */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Result of a full generation run.
 */
export interface GenerationResult {
  /** Package directory, relative to the filesystem root */
  packagePath: string;
  /** Finalized files in the order they were written */
  files: string[];
  metadata: PackageMetadata;
}

/** How the LICENSE stage will behave for the given options. */
export type LicenseSelection =
  | { kind: 'empty' }
  | { kind: 'template'; template: TemplatePath }
  | { kind: 'none' };

/**
 * Fail if the package directory exists and force is not set.
 */
export async function assertDestinationAvailable(
  filesystem: TargetFilesystem,
  packagePath: string,
  force: boolean
): Promise<void> {
  if (!force && (await filesystem.exists(packagePath))) {
    throw new DirectoryAlreadyExistsError(packagePath);
  }
}

export class PackageGenerator {
  readonly identity: PackageIdentity;
  readonly options: GenerationOptions;
  readonly metadata: PackageMetadata;
  /** Package directory, relative to the filesystem root */
  readonly packagePath: string;

  private readonly filesystem: TargetFilesystem;
  private readonly materializer: FileMaterializer;
  private readonly log: Logger;

  /**
   * @param destinationRoot - directory the package directory is created in
   * @param packageIdentifier - `vendor/package`
   */
  constructor(
    filesystem: TargetFilesystem,
    destinationRoot: string,
    packageIdentifier: string,
    options: GenerationOptionsInput = {},
    dependencies: PackageGeneratorDependencies = {}
  ) {
    this.filesystem = filesystem;
    this.identity = resolvePackageName(packageIdentifier);
    this.options = parseGenerationOptions(options);
    this.packagePath = joinTargetPath(destinationRoot, this.identity.name);

    const now = dependencies.now ?? (() => new Date());
    this.metadata = buildPackageMetadata(this.identity, now());

    this.log = dependencies.logger ?? logger.child('generator');
    this.materializer = new FileMaterializer(
      filesystem,
      dependencies.templates ?? new TemplateStore(),
      this.log
    );
  }

  /**
   * Run every stage.
   */
  async generate(): Promise<GenerationResult> {
    await assertDestinationAvailable(this.filesystem, this.packagePath, this.options.force);
    this.selectLicense();

    await this.filesystem.createDirectory(this.packagePath);
    this.log.debug(`Created ${this.packagePath}`);

    const stages: Record<GenerationStage, () => Promise<string[]>> = {
      base: () => this.generateBaseFiles(),
      config: () => this.generateConfigFile(),
      license: () => this.generateLicense(),
      serviceProvider: () => this.generateServiceProvider(),
      tests: () => this.generateTestFiles(),
      manifest: () => this.generateManifest(),
    };

    const files: string[] = [];
    for (const stage of GENERATION_STAGES) {
      files.push(...(await stages[stage]()));
    }

    return { packagePath: this.packagePath, files, metadata: this.metadata };
  }

  /**
   * .gitignore, CHANGELOG.md, README.md and an empty database/.gitkeep.
   */
  async generateBaseFiles(): Promise<string[]> {
    const files = await this.materializeStage('base');

    const marker = this.resolveDestination(DATABASE_MARKER);
    await this.filesystem.writeFile(marker, '', this.writeOptions());
    files.push(marker);

    return files;
  }

  async generateConfigFile(): Promise<string[]> {
    if (this.options.skipConfig) {
      this.log.info('Skipping config file');
      return [];
    }
    return this.materializeStage('config');
  }

  /**
   * LICENSE is empty when no license is given. An unknown license either
   * fails or writes nothing, depending on `onUnknownLicense`.
   */
  async generateLicense(): Promise<string[]> {
    const selection = this.selectLicense();
    const destination = this.resolveDestination(LICENSE_FILE);

    switch (selection.kind) {
      case 'empty':
        await this.filesystem.writeFile(destination, '', this.writeOptions());
        return [destination];
      case 'template':
        return [
          await this.materializer.materialize(
            selection.template,
            destination,
            this.metadata,
            this.writeOptions()
          ),
        ];
      case 'none':
        this.log.warn(`Unknown license "${this.options.license}", no LICENSE file written`);
        return [];
    }
  }

  async generateServiceProvider(): Promise<string[]> {
    return this.materializeStage('serviceProvider');
  }

  /**
   * tests/TestCase.php and the phpunit.xml runner config.
   */
  async generateTestFiles(): Promise<string[]> {
    const directory = this.resolveDestination(TESTS_DIRECTORY);
    await this.filesystem.createDirectory(directory);
    this.log.debug(`Created ${directory}`);
    return this.materializeStage('tests');
  }

  async generateManifest(): Promise<string[]> {
    return this.materializeStage('manifest');
  }

  /**
   * Decide what the LICENSE stage writes.
   * @throws UnknownLicenseError for an unknown name when the policy is `error`
   */
  selectLicense(): LicenseSelection {
    const { license, onUnknownLicense } = this.options;

    if (license === '') {
      return { kind: 'empty' };
    }

    const template = findLicenseTemplate(license);
    if (template) {
      return { kind: 'template', template };
    }

    if (onUnknownLicense === 'error') {
      throw new UnknownLicenseError(license, LICENSE_NAMES);
    }
    return { kind: 'none' };
  }

  private async materializeStage(stage: GenerationStage): Promise<string[]> {
    const files: string[] = [];
    for (const entry of plannedFiles(stage)) {
      const destination = this.resolveDestination(entry.destination);
      files.push(
        await this.materializer.materialize(entry.template, destination, this.metadata, this.writeOptions())
      );
    }
    return files;
  }

  private resolveDestination(relativePath: string): string {
    return joinTargetPath(this.packagePath, renderTemplate(relativePath, this.metadata));
  }

  private writeOptions(): WriteOptions {
    return { overwrite: this.options.force };
  }
}
