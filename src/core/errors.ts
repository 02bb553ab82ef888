/**
 * @module core/errors
 * @description Unified error types and error codes for planning queries
 *
 * Fatal conditions (bad configuration, broken tree invariants) are raised as
 * PlanningError subclasses. Rejected samples are not errors: the planner loop
 * records them as iteration outcomes and moves on.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the rrtkit library
 */
export const ErrorCodes = {
    // Configuration Errors
    /** Planner or space option failed validation */
    INVALID_CONFIG: 'INVALID_CONFIG',
    /** A configuration has the wrong number of coordinates */
    DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
    /** Start configuration rejected by the validity oracle */
    INVALID_START: 'INVALID_START',
    /** Validity oracle returned something other than a boolean */
    INVALID_ORACLE_RESPONSE: 'INVALID_ORACLE_RESPONSE',

    // Invariant Errors
    /** Tree structure broken (cycle, dangling parent, cost mismatch) */
    INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
    /** Nearest-neighbour query on an empty index */
    EMPTY_INDEX: 'EMPTY_INDEX',

    // Runtime Errors
    /** step() called on a planner that already terminated */
    NOT_RUNNING: 'NOT_RUNNING',
    /** Write to a logger after close() */
    LOGGER_CLOSED: 'LOGGER_CLOSED',
    /** Scenario or record validation failed */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Unexpected error from a collaborator */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Codes raised by ConfigurationError
 */
export type ConfigurationErrorCode =
    | typeof ErrorCodes.INVALID_CONFIG
    | typeof ErrorCodes.DIMENSION_MISMATCH
    | typeof ErrorCodes.INVALID_START
    | typeof ErrorCodes.INVALID_ORACLE_RESPONSE;

// ==================== Error Classes ====================

/**
 * Base error class for rrtkit
 */
export class PlanningError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'PlanningError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, PlanningError);
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
 * Malformed start/goal/bounds, dimension mismatch or a misbehaving oracle.
 * Fatal; never retried.
 */
export class ConfigurationError extends PlanningError {
    readonly errors: string[];

    constructor(
        message: string,
        code: ConfigurationErrorCode = ErrorCodes.INVALID_CONFIG,
        errors: string[] = [],
        details?: unknown
    ) {
        super(code, message, details ?? (errors.length > 0 ? { errors } : undefined));
        this.name = 'ConfigurationError';
        this.errors = errors;
    }
}

/**
 * Tree or index invariant breach. Indicates a logic bug; the query must abort.
 */
export class InvariantViolationError extends PlanningError {
    constructor(message: string, details?: unknown, code: typeof ErrorCodes.INVARIANT_VIOLATION | typeof ErrorCodes.EMPTY_INDEX = ErrorCodes.INVARIANT_VIOLATION) {
        super(code, message, details);
        this.name = 'InvariantViolationError';
    }
}

/**
 * Validation error (scenario files, serialized tree records)
 */
export class ValidationError extends PlanningError {
    readonly errors: string[];

    constructor(message: string, errors: string[] = []) {
        super(ErrorCodes.VALIDATION_ERROR, message, errors.length > 0 ? { errors } : undefined);
        this.name = 'ValidationError';
        this.errors = errors;
    }
}

/**
 * Planner stepped after reaching a terminal state
 */
export class NotRunningError extends PlanningError {
    constructor(state: string) {
        super(ErrorCodes.NOT_RUNNING, `Planner is not running (state: ${state})`, { state });
        this.name = 'NotRunningError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a PlanningError
 */
export function isPlanningError(error: unknown): error is PlanningError {
    return error instanceof PlanningError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isPlanningError(error) && error.code === code;
}

/**
 * Errors that end a planning query with a `failed` status
 */
export function isFatalPlanningError(error: unknown): error is ConfigurationError | InvariantViolationError {
    return error instanceof ConfigurationError || error instanceof InvariantViolationError;
}

/**
 * Wrap any error into a PlanningError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): PlanningError {
    if (isPlanningError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new PlanningError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new PlanningError(defaultCode, String(error));
}
