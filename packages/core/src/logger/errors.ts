import { StagefileRuntimeError } from '../errors/StagefileRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

/**
 * Logger error factory with typed methods for creating logger-specific errors
 * Each method creates a properly typed error with LOGGER scope
 */
export class LoggerError {
    static unknownTransportType(transportType: string): StagefileRuntimeError {
        return new StagefileRuntimeError(
            LoggerErrorCode.TRANSPORT_UNKNOWN_TYPE,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Unknown transport type: ${transportType}`,
            { transportType }
        );
    }

    static transportInitializationFailed(
        transportType: string,
        reason: string,
        details?: Record<string, unknown>
    ): StagefileRuntimeError {
        return new StagefileRuntimeError(
            LoggerErrorCode.TRANSPORT_INITIALIZATION_FAILED,
            ErrorScope.LOGGER,
            ErrorType.SYSTEM,
            `Failed to initialize ${transportType} transport: ${reason}`,
            { transportType, reason, ...details }
        );
    }

    static invalidConfig(message: string, context?: Record<string, unknown>): StagefileRuntimeError {
        return new StagefileRuntimeError(
            LoggerErrorCode.INVALID_CONFIG,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid logger configuration: ${message}`,
            context
        );
    }

    static invalidLogLevel(level: string, validLevels: readonly string[]): StagefileRuntimeError {
        return new StagefileRuntimeError(
            LoggerErrorCode.INVALID_LOG_LEVEL,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid log level '${level}'. Valid levels: ${validLevels.join(', ')}`,
            { level, validLevels },
            `Use one of: ${validLevels.join(', ')}`
        );
    }
}
