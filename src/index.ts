/**
 * stubsmith - scaffold a package from a fixed template set.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Package identity and metadata
export * from './core/package/index.js';

// Templates
export * from './core/templates/index.js';

// Target filesystems
export * from './core/filesystem/index.js';

// Generator
export * from './core/generator/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
