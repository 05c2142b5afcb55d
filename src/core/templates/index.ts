/**
 * Template exports barrel file.
 */
export { TemplateStore, TEMPLATE_PATHS, DEFAULT_TEMPLATE_DIR, isTemplatePath } from './store.js';
export type { TemplatePath } from './store.js';
export { renderTemplate, findPlaceholders } from './substitute.js';
export { LICENSES, LICENSE_NAMES, findLicenseTemplate } from './licenses.js';
export type { LicenseName } from './licenses.js';
