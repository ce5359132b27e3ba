/**
 * Engine errors
 */

/**
 * Custom secrets file is unreadable or has non-conforming content
 */
export class SecretsFileError extends Error {
  constructor(
    public readonly path: string,
    public readonly issues: string[],
  ) {
    super(`Invalid custom secrets file '${path}': ${issues.join("; ")}`);
    this.name = "SecretsFileError";
  }
}

/**
 * Two modules registered under the same name
 */
export class DuplicateModuleError extends Error {
  constructor(public readonly moduleName: string) {
    super(`Module '${moduleName}' is already registered`);
    this.name = "DuplicateModuleError";
  }
}

/**
 * Configuration names a module that doesn't exist
 */
export class UnknownModuleError extends Error {
  constructor(public readonly moduleName: string) {
    super(`Unknown module '${moduleName}'`);
    this.name = "UnknownModuleError";
  }
}

export class EmptyCandidateError extends Error {
  constructor() {
    super("At least one value is required");
    this.name = "EmptyCandidateError";
  }
}
