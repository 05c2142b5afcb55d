/**
 * Error types and codes for stubsmith.
 * Every error raised by the generator extends StubsmithError.
 */

/**
 * Base error class for all stubsmith errors.
 */
export class StubsmithError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StubsmithError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// Error code constants
export const ErrorCodes = {
  // Generation errors (G001-G005)
  INVALID_PACKAGE_NAME: 'G001',
  DIRECTORY_EXISTS: 'G002',
  TEMPLATE_NOT_FOUND: 'G003',
  FILESYSTEM: 'G004',
  UNKNOWN_LICENSE: 'G005',

  // Configuration errors (C001-C002)
  CONFIG_LOAD_ERROR: 'C001',
  PARSE_ERROR: 'C002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * The package identifier is not exactly two non-empty `/`-separated parts.
 */
export class InvalidPackageNameError extends StubsmithError {
  constructor(identifier: string) {
    super(
      ErrorCodes.INVALID_PACKAGE_NAME,
      `The given package name is not valid: "${identifier}". Expected "vendor/package".`,
      { identifier }
    );
    this.name = 'InvalidPackageNameError';
  }
}

/**
 * The package directory exists and `force` was not given.
 */
export class DirectoryAlreadyExistsError extends StubsmithError {
  constructor(path: string) {
    super(
      ErrorCodes.DIRECTORY_EXISTS,
      `Directory already exists: ${path}. Use --force to generate into it anyway.`,
      { path }
    );
    this.name = 'DirectoryAlreadyExistsError';
  }
}

export class TemplateNotFoundError extends StubsmithError {
  constructor(templatePath: string, details?: Record<string, unknown>) {
    super(ErrorCodes.TEMPLATE_NOT_FOUND, `Template not found: ${templatePath}`, {
      templatePath,
      ...details,
    });
    this.name = 'TemplateNotFoundError';
  }
}

/**
 * An I/O operation on the target filesystem failed.
 */
export class FilesystemError extends StubsmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.FILESYSTEM, message, details);
    this.name = 'FilesystemError';
  }
}

export class UnknownLicenseError extends StubsmithError {
  constructor(license: string, known: readonly string[]) {
    super(
      ErrorCodes.UNKNOWN_LICENSE,
      `Unknown license "${license}". Known licenses: ${known.join(', ')}`,
      { license, known: [...known] }
    );
    this.name = 'UnknownLicenseError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends StubsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}
