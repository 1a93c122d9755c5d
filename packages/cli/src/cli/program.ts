import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import {
    StagefileRuntimeError,
    StagefileValidationError,
    toError,
    LOG_LEVELS,
} from '@stagefile/core';
import { DEFAULT_CONFIG_FILE } from '../config/index.js';
import { handleCheckCommand, handleRenderCommand, STDOUT_TARGET } from './commands/index.js';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
    const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
    return PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8'))).version;
}

/**
 * Print an error the way users read it: message, code and the recovery hint if any
 */
export function formatCliError(error: unknown): string {
    if (error instanceof StagefileValidationError) {
        return [
            chalk.red('✖ Invalid stagefile:'),
            ...error.issues.map((issue) => chalk.red(`  - ${issue.message}`)),
        ].join('\n');
    }
    if (error instanceof StagefileRuntimeError) {
        const lines = [chalk.red(`✖ ${error.message}`) + chalk.dim(` (${error.code})`)];
        if (error.recovery) {
            lines.push(chalk.dim(`  ${error.recovery}`));
        }
        return lines.join('\n');
    }
    return chalk.red(`✖ ${toError(error).message}`);
}

function describeConsumers(usedBy: string[]): string {
    if (usedBy.length === 0) {
        return 'unused';
    }
    const names = usedBy.map((name) => (name === '' ? 'final stage' : name));
    return `used by ${names.join(', ')}`;
}

/**
 * Run a command action, turning failures into a printed error and exit code 1
 */
function withErrorHandling<A extends unknown[]>(
    action: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
    return async (...args: A) => {
        try {
            await action(...args);
        } catch (error) {
            console.error(formatCliError(error));
            process.exitCode = 1;
        }
    };
}

interface CommonFlags {
    logLevel: string;
    logFile?: string;
    color: boolean;
}

interface RenderFlags extends CommonFlags {
    out: string;
}

export function createProgram(): Command {
    const program = new Command();

    program
        .name('stagefile')
        .description('Render multi-stage build descriptions into Dockerfiles')
        .version(readVersion());

    const addCommonOptions = (command: Command): Command =>
        command
            .option(
                '--log-level <level>',
                `Minimum log level (${LOG_LEVELS.join(', ')})`,
                'warn'
            )
            .option('--log-file <path>', 'Also write logs as JSON lines to this file')
            .option('--no-color', 'Disable colored output');

    addCommonOptions(
        program
            .command('render')
            .description('Render a stagefile into a Dockerfile')
            .argument('[config]', 'Path to the stagefile', DEFAULT_CONFIG_FILE)
            .option('-o, --out <file>', `Output file ("${STDOUT_TARGET}" for stdout)`, 'Dockerfile')
    ).action(
        withErrorHandling(async (config: string, flags: RenderFlags) => {
            const result = await handleRenderCommand({
                config,
                out: flags.out,
                logLevel: flags.logLevel,
                logFile: flags.logFile,
                color: flags.color,
            });

            if (result.outputPath) {
                const stages = result.stageCount === 1 ? '1 stage' : `${result.stageCount} stages`;
                console.log(chalk.green(`✔ Wrote ${result.outputPath} (${stages})`));
            }
        })
    );

    addCommonOptions(
        program
            .command('check')
            .description('Validate a stagefile and show the stage emission order')
            .argument('[config]', 'Path to the stagefile', DEFAULT_CONFIG_FILE)
    ).action(
        withErrorHandling(async (config: string, flags: CommonFlags) => {
            const result = await handleCheckCommand({
                config,
                logLevel: flags.logLevel,
                logFile: flags.logFile,
                color: flags.color,
            });

            console.log(chalk.bold(result.image ? `Stages of ${result.image}:` : 'Stages:'));
            result.stages.forEach((stage, index) => {
                console.log(`  ${index + 1}. ${stage.name} ${chalk.dim(`(${describeConsumers(stage.usedBy)})`)}`);
            });
            console.log(`  ${result.stages.length + 1}. ${chalk.dim('(final stage)')}`);
            console.log(chalk.green('✔ Stagefile is valid'));
        })
    );

    return program;
}
