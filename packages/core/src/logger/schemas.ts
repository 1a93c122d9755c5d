/**
 * Logger Configuration Schemas
 *
 * Zod schemas for logger configuration with multi-transport support.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Silent transport configuration (no-op, discards all logs)
 */
const SilentTransportSchema = z
    .object({
        type: z.literal('silent'),
    })
    .strict()
    .describe('Silent transport that discards all logs');

/**
 * Console transport configuration
 */
const ConsoleTransportSchema = z
    .object({
        type: z.literal('console'),
        colorize: z.boolean().default(true).describe('Enable colored output'),
        stderrOnly: z
            .boolean()
            .default(false)
            .describe('Write every level to stderr (use when rendering to stdout)'),
    })
    .strict()
    .describe('Console transport for terminal output');

/**
 * File transport configuration with rotation support
 */
const FileTransportSchema = z
    .object({
        type: z.literal('file'),
        path: z.string().min(1).describe('Path to log file'),
        maxSize: z
            .number()
            .positive()
            .default(10 * 1024 * 1024)
            .describe('Max file size in bytes before rotation (default: 10MB)'),
        maxFiles: z
            .number()
            .int()
            .positive()
            .default(5)
            .describe('Max number of rotated files to keep (default: 5)'),
    })
    .strict()
    .describe('File transport with rotation support');

/**
 * Transport configuration (discriminated union)
 */
export const LoggerTransportSchema = z.discriminatedUnion('type', [
    SilentTransportSchema,
    ConsoleTransportSchema,
    FileTransportSchema,
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

/**
 * Logger configuration schema
 */
export const LoggerConfigSchema = z
    .object({
        level: LogLevelSchema.default('warn').describe('Minimum log level to record'),
        transports: z
            .array(LoggerTransportSchema)
            .min(1)
            .default([{ type: 'console', colorize: true, stderrOnly: false }])
            .describe('Log output destinations'),
    })
    .strict()
    .describe('Logger configuration with multi-transport support');

export type LoggerConfig = z.input<typeof LoggerConfigSchema>;
export type ValidatedLoggerConfig = z.output<typeof LoggerConfigSchema>;
