// packages/cli/src/cli/commands/render.ts

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { StagefileLogComponent, renderDockerfile } from '@stagefile/core';
import { DEFAULT_CONFIG_FILE, loadStagefileConfig } from '../../config/index.js';
import { LoggingOptionsSchema, createCommandLogger, parseCommandOptions } from '../utils/options.js';

export const STDOUT_TARGET = '-';

const RenderCommandSchema = LoggingOptionsSchema.extend({
    config: z.string().min(1).default(DEFAULT_CONFIG_FILE),
    out: z.string().min(1).default('Dockerfile'),
}).strict();

export type RenderCommandOptions = z.output<typeof RenderCommandSchema>;
export type RenderCommandOptionsInput = z.input<typeof RenderCommandSchema>;

export interface RenderResult {
    /** Absolute path written, or null when the output went to stdout */
    outputPath: string | null;
    /** Named stages plus the final stage */
    stageCount: number;
    /** Reference of the image being built, when the stagefile declares one */
    image?: string;
    content: string;
}

/**
 * Render a stagefile into a Dockerfile.
 *
 * The whole file is rendered in memory first, so a failing stagefile never
 * leaves a partial Dockerfile behind.
 */
export async function handleRenderCommand(
    input: RenderCommandOptionsInput,
    stdout: NodeJS.WritableStream = process.stdout
): Promise<RenderResult> {
    const options = parseCommandOptions(RenderCommandSchema, input);
    const toStdout = options.out === STDOUT_TARGET;
    const logger = createCommandLogger(options, toStdout);

    try {
        const dockerfile = await loadStagefileConfig(
            options.config,
            logger.createChild(StagefileLogComponent.CONFIG)
        );
        const content = renderDockerfile(dockerfile, { logger });
        const stageCount = Object.keys(dockerfile.stages ?? {}).length + 1;

        if (toStdout) {
            stdout.write(content);
            return { outputPath: null, stageCount, image: dockerfile.image, content };
        }

        const outputPath = path.resolve(options.out);
        await fs.mkdir(path.dirname(outputPath), { recursive: true });
        await fs.writeFile(outputPath, content, 'utf-8');
        logger.info(`Wrote ${outputPath}`, { stageCount, bytes: Buffer.byteLength(content) });

        return { outputPath, stageCount, image: dockerfile.image, content };
    } catch (error) {
        logger.debug('Render failed', {
            error: error instanceof Error ? error.message : String(error),
        });
        throw error;
    } finally {
        await logger.destroy();
    }
}
