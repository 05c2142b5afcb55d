/**
 * Declarative table of the files a package is generated with.
 * Adding a generated file means adding an entry here.
 */
import type { TemplatePath } from '../templates/store.js';

/** Generation stages, in the order they run. */
export const GENERATION_STAGES = [
  'base',
  'config',
  'license',
  'serviceProvider',
  'tests',
  'manifest',
] as const;

export type GenerationStage = (typeof GENERATION_STAGES)[number];

export interface PlannedFile {
  stage: GenerationStage;
  template: TemplatePath;
  /** Destination inside the package directory; may contain `${token}` placeholders */
  destination: string;
}

export const GENERATION_PLAN: readonly PlannedFile[] = [
  { stage: 'base', template: '.gitignore.stub', destination: '.gitignore' },
  { stage: 'base', template: 'CHANGELOG.md.stub', destination: 'CHANGELOG.md' },
  { stage: 'base', template: 'README.md.stub', destination: 'README.md' },
  { stage: 'config', template: 'config/config.php.stub', destination: 'config/${packageName}.php' },
  { stage: 'serviceProvider', template: 'src/PackageServiceProvider.php.stub', destination: 'src/${serviceProvider}.php' },
  { stage: 'tests', template: 'tests/TestCase.php.stub', destination: 'tests/TestCase.php' },
  { stage: 'tests', template: 'phpunit.xml.stub', destination: 'phpunit.xml' },
  { stage: 'manifest', template: 'composer.json.stub', destination: 'composer.json' },
];

/** Written without a template; the license body is chosen at run time. */
export const LICENSE_FILE = 'LICENSE';
export const DATABASE_MARKER = 'database/.gitkeep';
export const TESTS_DIRECTORY = 'tests';

export function plannedFiles(stage: GenerationStage): PlannedFile[] {
  return GENERATION_PLAN.filter((entry) => entry.stage === stage);
}
