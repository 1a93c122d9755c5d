/**
 * Logger Factory
 *
 * Creates logger instances from (unvalidated) logger configuration.
 */

import { LoggerConfigSchema } from './schemas.js';
import type { LoggerConfig } from './schemas.js';
import type { Logger } from './types.js';
import { StagefileLogComponent } from './types.js';
import { StagefileLogger } from './stagefile-logger.js';
import { createTransports } from './transport-factory.js';
import { LoggerError } from './errors.js';

export interface CreateLoggerOptions {
    /** Logger configuration; defaults apply to missing fields */
    config?: LoggerConfig;
    /** Component identifier (defaults to CLI) */
    component?: StagefileLogComponent;
}

/**
 * Create a logger instance from configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: { level: 'debug', transports: [{ type: 'console' }] },
 *   component: StagefileLogComponent.CLI,
 * });
 *
 * logger.info('Rendering stagefile.yml');
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
    const { config = {}, component = StagefileLogComponent.CLI } = options;

    const parsed = LoggerConfigSchema.safeParse(config);
    if (!parsed.success) {
        throw LoggerError.invalidConfig(
            parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '),
            { config }
        );
    }

    return new StagefileLogger({
        level: parsed.data.level,
        component,
        transports: createTransports(parsed.data.transports),
    });
}
