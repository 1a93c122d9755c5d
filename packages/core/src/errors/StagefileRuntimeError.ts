import { StagefileBaseError } from './StagefileBaseError.js';
import type { ErrorScope, ErrorType, StagefileErrorCode } from './types.js';

/**
 * Single coded error thrown by runtime operations (resolution, file access, transports).
 * Domains build these through their factory classes (e.g. `DockerfileError.missingStage`)
 * rather than calling the constructor directly.
 */
export class StagefileRuntimeError<C = Record<string, unknown>> extends StagefileBaseError {
    constructor(
        public readonly code: StagefileErrorCode | string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string
    ) {
        super(message);
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            ...(this.context !== undefined && { context: this.context }),
            ...(this.recovery !== undefined && { recovery: this.recovery }),
        };
    }
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }
    return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
