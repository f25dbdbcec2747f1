import { decodeLossy } from "@lsmp3/listing-contract";

/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can fix the input and run again
    FATAL = "FATAL", // Listing cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Input errors
    INVALID_PATH = "INVALID_PATH",
    INVALID_ARGUMENT = "INVALID_ARGUMENT",
    INVALID_CONFIG = "INVALID_CONFIG",

    // File system errors
    READ_FAULT = "READ_FAULT",

    // Metadata errors
    TAG_READ_FAULT = "TAG_READ_FAULT",
}

export type AppErrorDetails = Record<string, unknown>;

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: AppErrorDetails
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

/**
 * Check if an error is recoverable
 */
export function isRecoverable(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.RECOVERABLE;
    }
    return false;
}

export interface NodeSystemError extends Error {
    code: string;
    errno?: number;
    syscall?: string;
}

export function isNodeSystemError(error: unknown): error is NodeSystemError {
    return (
        error instanceof Error &&
        "code" in error &&
        typeof error.code === "string"
    );
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export type ErrorPath = string | Buffer;

const displayPath = (path: ErrorPath): string =>
    typeof path === "string" ? path : decodeLossy(path);

export function invalidPathError(path: ErrorPath): AppError {
    const shown = displayPath(path);
    return new AppError(
        ErrorCode.INVALID_PATH,
        ErrorCategory.RECOVERABLE,
        `cannot access ${JSON.stringify(shown)}: no such file or directory`,
        { path: shown }
    );
}

export function tagReadError(path: ErrorPath, cause: unknown): AppError {
    const shown = displayPath(path);
    return new AppError(
        ErrorCode.TAG_READ_FAULT,
        ErrorCategory.FATAL,
        `attempting to read ${JSON.stringify(shown)} resulted in an error: ${describeError(cause)}`,
        { path: shown, originalError: describeError(cause) }
    );
}

/**
 * Wrap a Node.js file system error in an AppError tied to `path`
 */
export function wrapNodeError(err: unknown, path: ErrorPath): AppError {
    if (err instanceof AppError) {
        return err;
    }

    const shown = displayPath(path);
    const details: AppErrorDetails = {
        path: shown,
        originalError: describeError(err),
    };
    if (isNodeSystemError(err)) {
        details.errno = err.code;
    }

    return new AppError(
        ErrorCode.READ_FAULT,
        ErrorCategory.FATAL,
        `attempting to read ${JSON.stringify(shown)} resulted in an error: ${describeError(err)}`,
        details
    );
}
