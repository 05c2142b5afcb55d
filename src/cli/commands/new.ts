import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadProjectConfig, resolveGenerationOptions } from '../../core/config/index.js';
import { LocalFilesystem, MemoryFilesystem } from '../../core/filesystem/index.js';
import { PackageGenerator, assertDestinationAvailable } from '../../core/generator/index.js';
import type { GenerationResult } from '../../core/generator/index.js';
import { TemplateStore, LICENSE_NAMES } from '../../core/templates/index.js';
import { TemplateNotFoundError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface NewOptions {
  path?: string;
  force?: boolean;
  /** false when --no-config is given */
  config?: boolean;
  license?: string;
  templates?: string;
  allowUnknownLicense?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Create the new command.
 */
export function createNewCommand(): Command {
  return new Command('new')
    .description('Generate a new package from the template set')
    .argument('<package>', 'Package name as vendor/package (e.g., acme/blog-tools)')
    .option('-p, --path <dir>', 'Directory to create the package in')
    .option('-f, --force', 'Generate into an existing package directory, overwriting files')
    .option('--no-config', 'Do not generate a config file')
    .option('-l, --license <license>', `License to include: ${LICENSE_NAMES.join(', ')}`)
    .option('--templates <dir>', 'Directory holding a replacement template set')
    .option('--allow-unknown-license', 'Skip the LICENSE file for an unknown license instead of failing')
    .option('--dry-run', 'List the files that would be generated without writing them')
    .option('-v, --verbose', 'Log every file as it is written')
    .option('-q, --quiet', 'Only print errors')
    .action(async (identifier: string, options: NewOptions) => {
      try {
        await runNew(identifier, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runNew(identifier: string, options: NewOptions): Promise<void> {
  const projectRoot = process.cwd();

  if (options.verbose) {
    log.setLevel('debug');
  } else if (options.quiet) {
    log.setLevel('error');
  }

  const config = await loadProjectConfig(projectRoot);
  const generationOptions = resolveGenerationOptions(config, {
    force: options.force,
    skipConfig: options.config === false ? true : undefined,
    license: options.license,
    onUnknownLicense: options.allowUnknownLicense ? 'skip' : undefined,
  });

  const templateDir = options.templates ?? config.templates;
  const templates = templateDir
    ? new TemplateStore(path.resolve(projectRoot, templateDir))
    : new TemplateStore();

  const missing = await templates.verify();
  if (missing.length > 0) {
    throw new TemplateNotFoundError(missing[0], { templateDir: templates.templateDir, missing });
  }

  const target = new LocalFilesystem(path.resolve(projectRoot, options.path ?? config.destination ?? '.'));

  if (options.dryRun) {
    const generator = new PackageGenerator(new MemoryFilesystem(), '', identifier, generationOptions, { templates });
    await assertDestinationAvailable(target, generator.packagePath, generationOptions.force);
    const result = await generator.generate();
    printDryRun(target, result);
    return;
  }

  const generator = new PackageGenerator(target, '', identifier, generationOptions, { templates });
  const result = await generator.generate();

  if (options.quiet) return;

  const packageDir = target.resolve(result.packagePath);
  console.log();
  log.success(`Created ${result.metadata.fullPackageName} in ${packageDir}`);
  console.log();
  console.log(chalk.dim('Next steps:'));
  console.log(`  1. ${chalk.cyan(`cd ${packageDir}`)}`);
  console.log(`  2. ${chalk.cyan('composer install')}`);
  console.log(`  3. Register ${chalk.cyan(`${result.metadata.namespace}\\${result.metadata.serviceProvider}`)} in your application`);
}

function printDryRun(target: LocalFilesystem, result: GenerationResult): void {
  console.log();
  console.log(chalk.bold('Dry Run - Would generate:'));
  console.log();
  console.log(chalk.dim(`Path: ${target.resolve(result.packagePath)}`));
  for (const file of result.files) {
    console.log(`  ${file}`);
  }
}
