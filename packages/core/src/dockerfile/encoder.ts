import type { Logger } from '../logger/types.js';
import type { Stage } from './schemas.js';
import type { StageResolution } from './resolver.js';
import type { DirectiveSink } from './sink.js';
import { DIRECTIVES } from './directives.js';
import type { Directive, DirectiveKeyword } from './directives.js';
import { mayQuote } from './quote.js';
import { DockerfileError } from './errors.js';

export interface EncodeStageOptions {
    /** Stage name; the final stage has none */
    name?: string;
    /** Rewrites recorded by the resolver for this stage */
    resolution?: StageResolution;
    logger?: Logger;
}

function sortedKeys(values: Record<string, string>): string[] {
    return Object.keys(values).sort();
}

/**
 * Group sources by destination, so `{ a: './', b: './' }` becomes one `ADD a b ./`
 */
function groupByDestination(values: Record<string, string>): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    for (const [source, destination] of Object.entries(values)) {
        const sources = groups.get(destination);
        if (sources) {
            sources.push(source);
        } else {
            groups.set(destination, [source]);
        }
    }
    return groups;
}

function unsupportedShape(directive: never): never {
    const value: unknown = directive;
    const keyword =
        typeof value === 'object' && value !== null && 'keyword' in value
            ? String(value.keyword)
            : 'unknown';
    const shape =
        typeof value === 'object' && value !== null && 'shape' in value
            ? String(value.shape)
            : 'unknown';
    throw DockerfileError.unsupportedShape(keyword, shape);
}

/**
 * Write the directives of one stage to the sink, in DIRECTIVES order.
 * Empty and absent fields produce nothing.
 */
export function encodeStage(stage: Stage, sink: DirectiveSink, options: EncodeStageOptions = {}): void {
    const { name, resolution, logger } = options;
    let lines = 0;

    const write = (keyword: DirectiveKeyword, values: string[]): void => {
        if (values.length === 0) {
            return;
        }

        let line: string = keyword;
        for (let value of values) {
            switch (keyword) {
                case 'FROM':
                    // Appended after quoting: `FROM "my image" as base`
                    if (name) {
                        value += ` as ${name}`;
                    }
                    break;
                case 'COPY':
                    value = resolution?.rewrites.get(value) ?? value;
                    break;
            }
            line += ` ${value}`;
        }

        sink.write(`${line}\n`);
        lines++;
    };

    for (const directive of DIRECTIVES) {
        encodeDirective(stage, directive, write);
    }

    logger?.debug(`Encoded stage ${name ?? '(final)'}`, { directives: lines });
}

function encodeDirective(
    stage: Stage,
    directive: Directive,
    write: (keyword: DirectiveKeyword, values: string[]) => void
): void {
    switch (directive.shape) {
        case 'scalar': {
            const value = stage[directive.field];
            if (!value) {
                return;
            }
            write(directive.keyword, [directive.flag === 'inline' ? value : mayQuote(value)]);
            return;
        }

        case 'sequence': {
            const values = stage[directive.field] ?? [];
            if (values.length === 0) {
                return;
            }
            switch (directive.flag) {
                case 'array':
                    write(directive.keyword, [JSON.stringify(values)]);
                    return;
                case 'script':
                    write(directive.keyword, [values.join(' && ')]);
                    return;
                case undefined:
                    write(directive.keyword, [values.join('')]);
                    return;
            }
        }

        case 'mapping': {
            const values = stage[directive.field] ?? {};
            switch (directive.flag) {
                case 'join': {
                    const groups = groupByDestination(values);
                    for (const destination of [...groups.keys()].sort()) {
                        const sources = groups.get(destination) ?? [];
                        write(directive.keyword, [...sources.sort(), destination]);
                    }
                    return;
                }
                case 'multi':
                    write(
                        directive.keyword,
                        sortedKeys(values).map((key) => `${key}=${mayQuote(values[key] ?? '')}`)
                    );
                    return;
                case undefined:
                    for (const key of sortedKeys(values)) {
                        write(directive.keyword, [key, mayQuote(values[key] ?? '')]);
                    }
                    return;
            }
        }

        default:
            unsupportedShape(directive);
    }
}
