/**
 * @module core/errors
 * @description Error types and error codes shared by the kinematics core, the runner and the demo task
 *
 * Configuration problems surface as `InvalidConfigurationError` before any simulation loop
 * starts. `DimensionError` marks wiring mistakes between a Jacobian and a velocity vector.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for omnikin
 */
export const ErrorCodes = {
    /** Unsupported wheel count or non-positive physical constant */
    INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
    /** Jacobian and velocity vector of mismatched dimension */
    DIMENSION_ERROR: 'DIMENSION_ERROR',
    /** Invalid runtime argument (timestep, frame count, profile input) */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Anything not raised by omnikin itself */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for omnikin
 */
export class OmniError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'OmniError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, OmniError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Configuration rejected at construction time (geometry or simulation settings)
 */
export class InvalidConfigurationError extends OmniError {
    readonly errors: string[];

    constructor(message: string, errors: string[] = [message]) {
        super(ErrorCodes.INVALID_CONFIGURATION, message, { errors });
        this.name = 'InvalidConfigurationError';
        this.errors = errors;
    }
}

/**
 * Matrix/vector dimensions do not line up
 */
export class DimensionError extends OmniError {
    readonly expected: number;
    readonly actual: number;

    constructor(message: string, expected: number, actual: number) {
        super(ErrorCodes.DIMENSION_ERROR, message, { expected, actual });
        this.name = 'DimensionError';
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * Validation error (invalid timestep, frame count or command)
 */
export class ValidationError extends OmniError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is an OmniError
 */
export function isOmniError(error: unknown): error is OmniError {
    return error instanceof OmniError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isOmniError(error) && error.code === code;
}

/**
 * Wrap any error into an OmniError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): OmniError {
    if (isOmniError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new OmniError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new OmniError(defaultCode, String(error));
}
