import type { DockerfileErrorCode } from '../dockerfile/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    DOCKERFILE = 'dockerfile', // Stage resolution, ordering, directive emission
    CONFIG = 'config', // Configuration file operations, parsing, validation
    LOGGER = 'logger', // Logging system operations, transports, and configuration
    CLI = 'cli', // Command line surface, output writing
}

/**
 * Error types describing the nature of the error
 */
export enum ErrorType {
    USER = 'user', // bad input, config errors, validation failures
    NOT_FOUND = 'not_found', // referenced file or stage doesn't exist
    SYSTEM = 'system', // bugs, internal failures, unexpected states
    UNKNOWN = 'unknown', // unclassified errors, fallback
}

/**
 * Union type for all error codes owned by the core package.
 * Outer packages (config loader, CLI) define their own codes and pass them as strings.
 */
export type StagefileErrorCode = DockerfileErrorCode | LoggerErrorCode;

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: StagefileErrorCode | string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType;
    path?: Array<string | number>;
    context?: C;
}
