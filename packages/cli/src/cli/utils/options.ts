import { z } from 'zod';
import {
    ErrorScope,
    LogLevelSchema,
    StagefileLogComponent,
    StagefileValidationError,
    createLogger,
    zodToIssues,
} from '@stagefile/core';
import type { Logger, LoggerTransportConfig } from '@stagefile/core';

/**
 * Options every command shares: where logs go and how loud they are
 */
export const LoggingOptionsSchema = z.object({
    // Flags arrive as plain strings; the pipe narrows them to a log level
    logLevel: z.string().pipe(LogLevelSchema).default('warn'),
    logFile: z.string().min(1).optional(),
    color: z.boolean().default(true),
});

export type LoggingOptions = z.output<typeof LoggingOptionsSchema>;

/**
 * Parse command options, reporting problems as validation issues in CLI scope
 */
export function parseCommandOptions<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new StagefileValidationError(zodToIssues(result.error, ErrorScope.CLI));
    }
    return result.data;
}

/**
 * Build the command logger. When the rendered file goes to stdout, console
 * logs move to stderr so the two never mix.
 */
export function createCommandLogger(options: LoggingOptions, writesToStdout = false): Logger {
    const transports: LoggerTransportConfig[] = [
        { type: 'console', colorize: options.color, stderrOnly: writesToStdout },
    ];
    if (options.logFile) {
        transports.push({
            type: 'file',
            path: options.logFile,
            maxSize: 10 * 1024 * 1024,
            maxFiles: 5,
        });
    }

    return createLogger({
        config: { level: options.logLevel, transports },
        component: StagefileLogComponent.CLI,
    });
}
