import { promises as fs } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { parseDockerfile } from '@stagefile/core';
import type { Dockerfile, Logger } from '@stagefile/core';
import { ConfigError } from './errors.js';
import { cleanNullValues } from './clean-null-values.js';

export const DEFAULT_CONFIG_FILE = 'stagefile.yml';

/**
 * Load and validate a stagefile (YAML build description).
 *
 * @param configPath - Path to the stagefile (absolute or relative to cwd)
 * @param logger - logger instance for logging
 * @throws {StagefileRuntimeError} with FILE_NOT_FOUND if the file does not exist
 * @throws {StagefileRuntimeError} with FILE_READ_ERROR if reading fails (e.g., permissions)
 * @throws {StagefileRuntimeError} with PARSE_ERROR if the content is not valid YAML
 * @throws {StagefileValidationError} if the content does not describe a valid build
 */
export async function loadStagefileConfig(configPath: string, logger?: Logger): Promise<Dockerfile> {
    const absolutePath = path.resolve(configPath);

    try {
        await fs.access(absolutePath);
    } catch {
        throw ConfigError.fileNotFound(absolutePath);
    }

    let fileContent: string;
    try {
        fileContent = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
        throw ConfigError.fileReadError(
            absolutePath,
            error instanceof Error ? error.message : String(error)
        );
    }

    let raw: unknown;
    try {
        raw = parseYaml(fileContent);
    } catch (error) {
        throw ConfigError.parseError(
            absolutePath,
            error instanceof Error ? error.message : String(error)
        );
    }

    // An empty document describes an empty build
    const dockerfile = parseDockerfile(cleanNullValues(raw ?? {}));

    logger?.debug(`Loaded stagefile ${absolutePath}`, {
        stages: Object.keys(dockerfile.stages ?? {}),
    });

    return dockerfile;
}
