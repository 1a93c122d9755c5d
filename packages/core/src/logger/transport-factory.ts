/**
 * Transport Factory
 *
 * Creates transport instances from validated configuration.
 */

import type { LoggerTransport } from './types.js';
import type { LoggerTransportConfig } from './schemas.js';
import { SilentTransport } from './transports/silent-transport.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { LoggerError } from './errors.js';

export function createTransport(config: LoggerTransportConfig): LoggerTransport {
    switch (config.type) {
        case 'silent':
            return new SilentTransport();

        case 'console':
            return new ConsoleTransport({
                colorize: config.colorize,
                stderrOnly: config.stderrOnly,
            });

        case 'file':
            try {
                return new FileTransport({
                    path: config.path,
                    maxSize: config.maxSize,
                    maxFiles: config.maxFiles,
                });
            } catch (error) {
                throw LoggerError.transportInitializationFailed(
                    'file',
                    error instanceof Error ? error.message : String(error),
                    { path: config.path }
                );
            }

        default: {
            const unknownType: never = config;
            throw LoggerError.unknownTransportType(JSON.stringify(unknownType));
        }
    }
}

export function createTransports(configs: LoggerTransportConfig[]): LoggerTransport[] {
    return configs.map(createTransport);
}
