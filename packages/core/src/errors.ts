/**
 * `@json-echo/core` - Error definitions
 *
 * Error classes for file access, configuration loading and route queries.
 * Each category has an abstract base so callers can branch with `instanceof`.
 */

// ============================================================================
// FILE SYSTEM
// ============================================================================

/**
 * Base class for errors raised while reading or writing files.
 */
export abstract class FileSystemError extends Error {
    /**
     * @param path - Absolute path of the file the operation targeted
     * @param message - Human readable description
     */
    constructor(
        public readonly path: string,
        message: string,
    ) {
        super(message);
    }
}

/**
 * Error thrown when a file does not exist.
 */
export class NotFoundError extends FileSystemError {
    readonly name = 'NotFoundError';

    constructor(path: string) {
        super(path, `File not found: ${path}`);
    }
}

/**
 * Error thrown when a file operation names a directory.
 */
export class IsADirectoryError extends FileSystemError {
    readonly name = 'IsADirectoryError';

    constructor(path: string) {
        super(path, `Expected a file but found a directory: ${path}`);
    }
}

/**
 * Error thrown when the process may not access a file.
 */
export class PermissionDeniedError extends FileSystemError {
    readonly name = 'PermissionDeniedError';

    constructor(path: string) {
        super(path, `Permission denied: ${path}`);
    }
}

/**
 * Error thrown for any other I/O failure, including an aborted operation.
 */
export class FileIOError extends FileSystemError {
    readonly name = 'FileIOError';

    /**
     * @param path - Absolute path of the file
     * @param cause - The underlying error
     */
    constructor(
        path: string,
        public readonly cause: Error,
    ) {
        super(path, `I/O error on ${path}: ${cause.message}`);
    }
}

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Base class for errors that reject a configuration document.
 */
export abstract class ConfigurationError extends Error {}

/**
 * Error thrown when a configuration file is not valid JSON.
 */
export class MalformedConfigError extends ConfigurationError {
    readonly name = 'MalformedConfigError';

    /**
     * @param path - Path of the unparsable document
     * @param cause - The parser error
     */
    constructor(
        public readonly path: string,
        public readonly cause: Error,
    ) {
        super(`Malformed JSON in ${path}: ${cause.message}`);
    }
}

/**
 * Error thrown when a top-level configuration field has the wrong shape.
 */
export class InvalidConfigError extends ConfigurationError {
    readonly name = 'InvalidConfigError';

    /**
     * @param field - Name of the offending field as written in the file
     * @param reason - What is wrong with it
     */
    constructor(
        public readonly field: string,
        public readonly reason: string,
    ) {
        super(`Invalid configuration field '${field}': ${reason}`);
    }
}

/**
 * Error thrown when a route entry is missing a field or has an invalid one.
 */
export class InvalidRouteError extends ConfigurationError {
    readonly name = 'InvalidRouteError';

    /**
     * @param key - Route key as written in the file
     * @param field - Offending field (`key` when the key itself is invalid)
     * @param reason - What is wrong with it
     */
    constructor(
        public readonly key: string,
        public readonly field: string,
        public readonly reason: string,
    ) {
        super(`Invalid route '${key}' (${field}): ${reason}`);
    }
}

/**
 * Error thrown when two route keys normalize to the same method and path.
 */
export class DuplicateRouteError extends ConfigurationError {
    readonly name = 'DuplicateRouteError';

    /**
     * @param key - Canonical `[METHOD] /path` identifier declared twice
     */
    constructor(public readonly key: string) {
        super(`Duplicate route: ${key} is declared more than once`);
    }
}

/**
 * Error thrown when a file-reference response cannot be read or parsed.
 */
export class ExternalResponseError extends ConfigurationError {
    readonly name = 'ExternalResponseError';

    /**
     * @param key - Route key whose response references the file
     * @param path - The referenced path as written in the configuration
     * @param cause - A {@link FileSystemError} or {@link MalformedConfigError}
     */
    constructor(
        public readonly key: string,
        public readonly path: string,
        public readonly cause: FileSystemError | MalformedConfigError,
    ) {
        super(
            `Could not resolve response file '${path}' for route '${key}': ${cause.message}`,
        );
    }
}

// ============================================================================
// QUERY
// ============================================================================

/**
 * Base class for errors raised while answering a request.
 */
export abstract class QueryError extends Error {}

/**
 * Error thrown when a model's `results_field` is absent from its data or does
 * not hold an array.
 */
export class MissingResultsFieldError extends QueryError {
    readonly name = 'MissingResultsFieldError';

    /**
     * @param modelKey - Identifier of the model
     * @param field - The configured results field
     */
    constructor(
        public readonly modelKey: string,
        public readonly field: string,
    ) {
        super(
            `Route ${modelKey} declares results_field '${field}' but its data has no array under that field`,
        );
    }
}
