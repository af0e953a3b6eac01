/**
 * Error taxonomy for the resource mapper.
 * Every error carries a machine-readable code, optional structured details and an optional cause.
 *
 * Conventions:
 * - Class names are PascalCase.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Transport failures raised by a connection are never wrapped; they reach the caller as thrown.
 */

/** Well-known error codes. */
export const ERROR_CODES = {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    NOT_FOUND: 'NOT_FOUND',
    MISSING_ATTRIBUTE: 'MISSING_ATTRIBUTE',
    READONLY_ATTRIBUTE: 'READONLY_ATTRIBUTE',
    INVALID_CUSTOM_FIELD_VALUE: 'INVALID_CUSTOM_FIELD_VALUE',
    UNSUPPORTED_SERVER_VERSION: 'UNSUPPORTED_SERVER_VERSION',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Structured metadata for diagnostics (resource type, attribute name, versions). */
    public readonly details?: Record<string, unknown>;
    /** Underlying cause (if any). */
    public override readonly cause?: unknown;

    /**
     * @param code ErrorCode - Machine error code (see ERROR_CODES)
     * @param message string - Human readable summary
     * @param details Record<string,unknown>|undefined - Additional structured context
     * @param cause unknown - Original error object or value
     */
    constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        this.cause = cause;
        // Maintain proper prototype chain (TS/JS quirk)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** ValidationError indicates malformed input or configuration. */
export class ValidationError extends AppError {
    constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details, cause);
    }
}

/** NotFoundError when a resource type, record or template does not exist. */
export class NotFoundError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(ERROR_CODES.NOT_FOUND, message, details);
    }
}

/** Attribute could not be resolved by decoding, relation filter or include refresh. */
export class ResourceAttributeError extends AppError {
    constructor(resourceName: string, attribute: string) {
        super(ERROR_CODES.MISSING_ATTRIBUTE, `Resource ${resourceName} has no attribute '${attribute}'`, {
            resourceName,
            attribute,
        });
    }
}

/** Write attempted against an attribute that is readonly in the current lifecycle state. */
export class ReadonlyAttributeError extends AppError {
    constructor(resourceName: string, attribute: string, isNew: boolean) {
        super(
            ERROR_CODES.READONLY_ATTRIBUTE,
            `Attribute '${attribute}' of ${resourceName} is readonly ${isNew ? `on create` : `on update`}`,
            { resourceName, attribute, isNew },
        );
    }
}

/** Custom fields must be given as an array of objects carrying an `id`. */
export class CustomFieldValueError extends AppError {
    constructor(message: string = `Custom fields must be an array of objects with an 'id' key`, cause?: unknown) {
        super(ERROR_CODES.INVALID_CUSTOM_FIELD_VALUE, message, undefined, cause);
    }
}

/** The connected server is older than an operation requires. */
export class ServerVersionMismatchError extends AppError {
    constructor(feature: string, requiredVersion: string, serverVersion: string) {
        super(
            ERROR_CODES.UNSUPPORTED_SERVER_VERSION,
            `${feature} requires server version ${requiredVersion} or newer, connected server is ${serverVersion}`,
            { feature, requiredVersion, serverVersion },
        );
    }
}
