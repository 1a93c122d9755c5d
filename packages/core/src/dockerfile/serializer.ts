import type { Logger } from '../logger/types.js';
import { StagefileLogComponent } from '../logger/types.js';
import { StageNameSchema } from './schemas.js';
import type { Dockerfile, Stage } from './schemas.js';
import {
    FINAL_STAGE_ID,
    createResolutionTable,
    getResolution,
    resolveStage,
} from './resolver.js';
import type { ResolutionTable } from './resolver.js';
import { encodeStage } from './encoder.js';
import { BufferSink } from './sink.js';
import type { DirectiveSink } from './sink.js';
import { DockerfileError } from './errors.js';

export interface SerializeOptions {
    logger?: Logger;
}

export interface StagePlan {
    /** Named stages in emission order; the final stage always follows them */
    order: string[];
    /** Distinct consumers of each named stage ('' is the final stage) */
    dependents: Map<string, string[]>;
    /** Resolution side table consumed by the encoder */
    table: ResolutionTable;
}

function byName(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order named stages so producers come before their consumers.
 *
 * Among stages whose producers are already placed, the one with the most
 * consumers goes first, ties broken by name. For flat graphs (only the final
 * stage or unrelated stages consume) this is exactly "most used first, then by name".
 *
 * @throws StagefileRuntimeError `dockerfile_stage_cycle` when named stages copy from each other in a cycle
 */
export function orderStages(names: string[], table: ResolutionTable): string[] {
    const consumers = (name: string): number => table.get(name)?.dependents.size ?? 0;
    const priority = (a: string, b: string): number => consumers(b) - consumers(a) || byName(a, b);

    const known = new Set(names);
    const pending = new Map<string, number>(names.map((name) => [name, 0]));
    const named = new Map<string, string[]>();

    for (const producer of names) {
        const dependents = [...(table.get(producer)?.dependents ?? [])].filter((id) =>
            known.has(id)
        );
        named.set(producer, dependents);
        for (const consumer of dependents) {
            pending.set(consumer, (pending.get(consumer) ?? 0) + 1);
        }
    }

    const ready = names.filter((name) => pending.get(name) === 0);
    const order: string[] = [];

    while (ready.length > 0) {
        ready.sort(priority);
        const next = ready.shift();
        if (next === undefined) {
            break;
        }
        order.push(next);

        for (const consumer of named.get(next) ?? []) {
            const remaining = (pending.get(consumer) ?? 0) - 1;
            pending.set(consumer, remaining);
            if (remaining === 0) {
                ready.push(consumer);
            }
        }
    }

    if (order.length < names.length) {
        const placed = new Set(order);
        throw DockerfileError.stageCycle(names.filter((name) => !placed.has(name)).sort(byName));
    }

    return order;
}

/**
 * Resolve every stage and decide the emission order, without emitting anything
 *
 * @throws StagefileRuntimeError `dockerfile_invalid_stage_name` for a stage key that could
 * collide with the final stage or not be referenced (e.g. `''`)
 */
export function planStages(dockerfile: Dockerfile, options: SerializeOptions = {}): StagePlan {
    const logger = options.logger?.createChild(StagefileLogComponent.RESOLVER);
    const stages = new Map<string, Stage>(Object.entries(dockerfile.stages ?? {}));
    const names = [...stages.keys()].sort(byName);
    const table = createResolutionTable();

    for (const name of names) {
        if (!StageNameSchema.safeParse(name).success) {
            throw DockerfileError.invalidStageName(name);
        }
    }

    for (const name of names) {
        const stage = stages.get(name);
        if (stage) {
            resolveStage(stage, name, stages, table, logger);
        }
    }
    resolveStage(dockerfile, FINAL_STAGE_ID, stages, table, logger);

    const order = orderStages(names, table);
    const dependents = new Map(
        names.map((name) => [name, [...getResolution(table, name).dependents].sort(byName)])
    );

    options.logger
        ?.createChild(StagefileLogComponent.SERIALIZER)
        .debug('Planned stage order', { order });

    return { order, dependents, table };
}

/**
 * Write a whole build description to the sink: named stages in planned order,
 * then the final stage.
 *
 * All references are validated before the first line is written, so a
 * resolution error leaves the sink untouched. Errors thrown by the sink itself
 * propagate as they are, and whatever was written before stays written.
 */
export function serializeDockerfile(
    dockerfile: Dockerfile,
    sink: DirectiveSink,
    options: SerializeOptions = {}
): void {
    const plan = planStages(dockerfile, options);
    const logger = options.logger?.createChild(StagefileLogComponent.ENCODER);

    for (const name of plan.order) {
        const stage = dockerfile.stages?.[name];
        if (!stage) {
            continue;
        }
        encodeStage(stage, sink, { name, resolution: plan.table.get(name), logger });
    }

    encodeStage(dockerfile, sink, {
        resolution: plan.table.get(FINAL_STAGE_ID),
        logger,
    });
}

/**
 * Render a build description to Dockerfile text
 */
export function renderDockerfile(dockerfile: Dockerfile, options: SerializeOptions = {}): string {
    const sink = new BufferSink();
    serializeDockerfile(dockerfile, sink, options);
    return sink.toString();
}
