/**
 * Copies a template into the target filesystem and renders it in place.
 */
import type { TargetFilesystem, WriteOptions } from '../filesystem/types.js';
import type { TemplateStore } from '../templates/store.js';
import type { PackageMetadata } from '../package/types.js';
import { renderTemplate, findPlaceholders } from '../templates/substitute.js';
import { logger, type Logger } from '../../utils/logger.js';

/** Marks a file that has not been rendered yet. */
export const STAGING_SUFFIX = '.stub';

export class FileMaterializer {
  private log: Logger;

  constructor(
    private readonly filesystem: TargetFilesystem,
    private readonly templates: TemplateStore,
    log: Logger = logger.child('materializer')
  ) {
    this.log = log;
  }

  /**
   * Write `<destination>.stub` with the raw template, render it, then rename
   * it to destination. Each step is a separate filesystem call; nothing is
   * undone if a later step fails.
   *
   * @returns the destination path
   */
  async materialize(
    templatePath: string,
    destinationPath: string,
    metadata: PackageMetadata,
    options: WriteOptions = {}
  ): Promise<string> {
    const stagingPath = `${destinationPath}${STAGING_SUFFIX}`;

    const raw = await this.templates.read(templatePath);
    await this.filesystem.writeFile(stagingPath, raw, options);

    const staged = await this.filesystem.readFile(stagingPath);
    const rendered = renderTemplate(staged, metadata);
    await this.filesystem.writeFile(stagingPath, rendered, { overwrite: true });

    const unresolved = findPlaceholders(rendered);
    if (unresolved.length > 0) {
      this.log.warn(`Unresolved placeholders in ${destinationPath}: ${unresolved.join(', ')}`);
    }

    await this.filesystem.renameFile(stagingPath, destinationPath, options);
    this.log.debug(`Wrote ${destinationPath}`, { template: templatePath });

    return destinationPath;
  }
}
