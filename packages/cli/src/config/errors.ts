import { StagefileRuntimeError, ErrorScope, ErrorType } from '@stagefile/core';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Config runtime error factory methods
 */
export class ConfigError {
    static fileNotFound(configPath: string) {
        return new StagefileRuntimeError(
            ConfigErrorCode.FILE_NOT_FOUND,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Configuration file not found: ${configPath}`,
            { configPath },
            'Ensure the stagefile exists at the specified path'
        );
    }

    static fileReadError(configPath: string, cause: string) {
        return new StagefileRuntimeError(
            ConfigErrorCode.FILE_READ_ERROR,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Failed to read configuration file: ${cause}`,
            { configPath, cause },
            'Check file permissions and ensure the file is not corrupted'
        );
    }

    static parseError(configPath: string, cause: string) {
        return new StagefileRuntimeError(
            ConfigErrorCode.PARSE_ERROR,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Failed to parse configuration file: ${cause}`,
            { configPath, cause },
            'Ensure the configuration file contains valid YAML syntax'
        );
    }
}
