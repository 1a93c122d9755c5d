import path from 'path';
import type { Logger } from '../logger/types.js';
import type { Stage } from './schemas.js';
import { DockerfileError } from './errors.js';

/**
 * Id of the implicit final stage in a resolution table. Stage names cannot be
 * empty, so it never collides with a named stage.
 */
export const FINAL_STAGE_ID = '';

/**
 * Derived state for one stage, built during resolution and read during emission.
 * Lives only for one serialization call; the caller's description is never touched.
 */
export interface StageResolution {
    /** Ids of the stages that copy from this one (each consumer once) */
    dependents: Set<string>;
    /** This stage's copy sources that point into other stages, mapped to their `--from=` form */
    rewrites: Map<string, string>;
}

export type ResolutionTable = Map<string, StageResolution>;

export function createResolutionTable(): ResolutionTable {
    return new Map();
}

export function getResolution(table: ResolutionTable, stageId: string): StageResolution {
    let resolution = table.get(stageId);
    if (!resolution) {
        resolution = { dependents: new Set(), rewrites: new Map() };
        table.set(stageId, resolution);
    }
    return resolution;
}

/**
 * Split a copy source into its stage reference, if it has one.
 * Only the first ':' separates; the path keeps any later colons.
 */
export function parseStageReference(source: string): { stageName: string; path: string } | null {
    const separator = source.indexOf(':');
    if (separator < 0) {
        return null;
    }
    return {
        stageName: source.slice(0, separator),
        path: source.slice(separator + 1),
    };
}

/**
 * Validate the cross-stage copies of one stage and record their rewrites.
 *
 * Marks `stageId` as a dependent of every stage it copies from, and maps each
 * `"<stage>:<path>"` source to `"--from=<stage> <workdir>/<path>"`. Sources
 * without a ':' are local copies and are left alone.
 *
 * @throws StagefileRuntimeError `dockerfile_missing_stage` when the referenced stage does not exist
 * @throws StagefileRuntimeError `dockerfile_missing_workdir` when the referenced stage has no workdir
 */
export function resolveStage(
    stage: Stage,
    stageId: string,
    stages: ReadonlyMap<string, Stage>,
    table: ResolutionTable,
    logger?: Logger
): void {
    const own = getResolution(table, stageId);

    for (const source of Object.keys(stage.copy ?? {}).sort()) {
        const reference = parseStageReference(source);
        if (!reference) {
            continue;
        }

        const producer = stages.get(reference.stageName);
        if (!producer) {
            throw DockerfileError.missingStage(reference.stageName, source, stageId);
        }
        if (!producer.workdir) {
            throw DockerfileError.missingWorkdir(reference.stageName, source, stageId);
        }

        getResolution(table, reference.stageName).dependents.add(stageId);

        const rewritten = `--from=${reference.stageName} ${path.posix.join(producer.workdir, reference.path)}`;
        own.rewrites.set(source, rewritten);

        logger?.debug(`Resolved cross-stage copy ${source}`, {
            consumer: stageId || '(final)',
            producer: reference.stageName,
            rewritten,
        });
    }
}
