import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { createNewCommand } from './commands/new.js';
import { createLicensesCommand } from './commands/licenses.js';

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf-8')
  );
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('stubsmith')
    .description('Scaffold a new package from a fixed template set')
    .version(readVersion());
  [createNewCommand, createLicensesCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
