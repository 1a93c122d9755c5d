// packages/cli/src/cli/commands/check.ts

import { z } from 'zod';
import { StagefileLogComponent, planStages } from '@stagefile/core';
import { DEFAULT_CONFIG_FILE, loadStagefileConfig } from '../../config/index.js';
import { LoggingOptionsSchema, createCommandLogger, parseCommandOptions } from '../utils/options.js';

const CheckCommandSchema = LoggingOptionsSchema.extend({
    config: z.string().min(1).default(DEFAULT_CONFIG_FILE),
}).strict();

export type CheckCommandOptionsInput = z.input<typeof CheckCommandSchema>;

export interface CheckedStage {
    name: string;
    /** Consumers of this stage; '' stands for the final stage */
    usedBy: string[];
}

export interface CheckResult {
    /** Named stages in emission order */
    stages: CheckedStage[];
    image?: string;
}

/**
 * Validate a stagefile and report the order its stages would be emitted in
 */
export async function handleCheckCommand(input: CheckCommandOptionsInput): Promise<CheckResult> {
    const options = parseCommandOptions(CheckCommandSchema, input);
    const logger = createCommandLogger(options);

    try {
        const dockerfile = await loadStagefileConfig(
            options.config,
            logger.createChild(StagefileLogComponent.CONFIG)
        );
        const plan = planStages(dockerfile, { logger });

        return {
            stages: plan.order.map((name) => ({
                name,
                usedBy: plan.dependents.get(name) ?? [],
            })),
            image: dockerfile.image,
        };
    } finally {
        await logger.destroy();
    }
}
