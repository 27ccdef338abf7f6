/**
 * Error taxonomy of the compiler.
 *
 * ConfigurationError and ResolutionError abort the run with exit code 2.
 * SchemaDocumentError is raised for input documents that do not have the
 * statement-tree shape. Schema limitations are not errors: the affected field
 * is downgraded and compilation continues.
 */

/**
 * A required option is missing or invalid. Raised before any input is read.
 */
export class ConfigurationError extends Error {
    override readonly name = "ConfigurationError";

    constructor(
        readonly option: string,
        message: string,
    ) {
        super(message);
    }
}

/**
 * A type, typedef, prefix or leafref target could not be resolved.
 */
export class ResolutionError extends Error {
    override readonly name = "ResolutionError";

    constructor(
        /** Qualified schema path of the offending node */
        readonly node: string,
        message: string,
    ) {
        super(`${message} (at ${node})`);
    }
}

export class SchemaDocumentError extends Error {
    override readonly name = "SchemaDocumentError";

    constructor(
        readonly source: string,
        message: string,
    ) {
        super(`${source}: ${message}`);
    }
}

/**
 * A construct proto3 cannot express exactly. The field falls back to string.
 */
export interface SchemaLimitation {
    node: string;
    reason: string;
}

export function isFatalCompileError(error: unknown): error is ConfigurationError | ResolutionError {
    return error instanceof ConfigurationError || error instanceof ResolutionError;
}
