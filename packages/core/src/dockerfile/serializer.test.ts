import { describe, it, expect } from 'vitest';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { StagefileRuntimeError } from '../errors/StagefileRuntimeError.js';
import { createMockLogger } from '../logger/test-utils.js';
import { StagefileLogComponent } from '../logger/types.js';
import { DockerfileErrorCode } from './error-codes.js';
import { args, containerEnvVar, scripts } from './helpers.js';
import type { Dockerfile } from './schemas.js';
import { BufferSink } from './sink.js';
import type { DirectiveSink } from './sink.js';
import { orderStages, planStages, renderDockerfile, serializeDockerfile } from './serializer.js';
import { createResolutionTable, getResolution } from './resolver.js';

function multiStage(): Dockerfile {
    return {
        stages: {
            builder: {
                from: 'busybox',
                workdir: '/go/src',
                run: scripts('touch a.txt', 'touch b.txt'),
            },
            builder2: {
                from: 'busybox',
                workdir: '/go/src',
                run: scripts('touch b.txt'),
            },
        },
        from: 'busybox',
        workdir: '/todo',
        copy: {
            'builder:./a.txt': './',
            'builder2:./b.txt': './',
        },
    };
}

describe('serializeDockerfile', () => {
    describe('single stage', () => {
        it('emits fields in declaration order', () => {
            const key = 'key';
            const dockerfile: Dockerfile = {
                from: 'busybox:latest',
                workdir: '/todo',
                env: { [key]: 'hello' },
                copy: { x: './' },
                entrypoint: args('sh'),
                cmd: args('-c', 'echo', containerEnvVar(key)),
            };

            expect(renderDockerfile(dockerfile)).toBe(
                [
                    'FROM busybox:latest',
                    'WORKDIR /todo',
                    'ENV key=hello',
                    'COPY x ./',
                    'ENTRYPOINT ["sh"]',
                    'CMD ["-c","echo","$key"]',
                    '',
                ].join('\n')
            );
        });

        it('renders an empty description as empty text', () => {
            expect(renderDockerfile({})).toBe('');
        });
    });

    describe('multiple stages', () => {
        it('emits named stages before the final stage with cross-stage copies rewritten', () => {
            expect(renderDockerfile(multiStage())).toBe(
                [
                    'FROM busybox as builder',
                    'WORKDIR /go/src',
                    'RUN touch a.txt && touch b.txt',
                    'FROM busybox as builder2',
                    'WORKDIR /go/src',
                    'RUN touch b.txt',
                    'FROM busybox',
                    'WORKDIR /todo',
                    'COPY --from=builder2 /go/src/b.txt ./',
                    'COPY --from=builder /go/src/a.txt ./',
                    '',
                ].join('\n')
            );
        });

        it('produces byte-identical output across calls', () => {
            const dockerfile = multiStage();
            expect(renderDockerfile(dockerfile)).toBe(renderDockerfile(dockerfile));
        });

        it('does not modify the description', () => {
            const dockerfile = multiStage();
            const before = JSON.stringify(dockerfile);

            renderDockerfile(dockerfile);

            expect(JSON.stringify(dockerfile)).toBe(before);
            expect(Object.keys(dockerfile.stages?.builder ?? {})).toEqual(['from', 'workdir', 'run']);
        });

        it('places a stage with more consumers ahead of one with fewer', () => {
            const dockerfile: Dockerfile = {
                stages: {
                    alpha: { from: 'busybox', workdir: '/a' },
                    zeta: { from: 'busybox', workdir: '/z' },
                    app: { from: 'busybox', copy: { 'zeta:bin': '/usr/bin/' } },
                },
                from: 'scratch',
                copy: { 'zeta:lib': '/lib/', 'alpha:x': '/x' },
            };

            expect(planStages(dockerfile).order).toEqual(['zeta', 'alpha', 'app']);
        });

        it('emits a producer before a consumer that outranks it', () => {
            const dockerfile: Dockerfile = {
                stages: {
                    vendor: { from: 'busybox', workdir: '/vendor' },
                    tools: { from: 'busybox', workdir: '/tools', copy: { 'vendor:lib': './lib' } },
                },
                from: 'scratch',
                copy: { 'tools:bin': '/bin' },
            };

            const output = renderDockerfile(dockerfile);

            expect(planStages(dockerfile).order).toEqual(['vendor', 'tools']);
            expect(output.indexOf('FROM busybox as vendor')).toBeLessThan(
                output.indexOf('FROM busybox as tools')
            );
            expect(output).toContain('COPY --from=vendor /vendor/lib ./lib\n');
            expect(output).toContain('COPY --from=tools /tools/bin /bin\n');
        });

        it('counts repeated references from one consumer once', () => {
            const dockerfile: Dockerfile = {
                stages: { builder: { from: 'golang', workdir: '/src' } },
                copy: { 'builder:a': '/a', 'builder:b': '/b' },
            };

            expect(planStages(dockerfile).dependents.get('builder')).toEqual(['']);
        });
    });

    describe('errors', () => {
        it('fails on a copy from an unknown stage and writes nothing', () => {
            const dockerfile: Dockerfile = {
                stages: { builder: { from: 'busybox', workdir: '/go/src' } },
                from: 'busybox',
                copy: { 'missing:./a.txt': './' },
            };
            const sink = new BufferSink();

            expect(() => serializeDockerfile(dockerfile, sink)).toThrow(
                expect.objectContaining({
                    code: DockerfileErrorCode.MISSING_STAGE,
                    scope: ErrorScope.DOCKERFILE,
                    type: ErrorType.NOT_FOUND,
                    message: 'missing stage missing',
                })
            );
            expect(sink.isEmpty).toBe(true);
        });

        it('fails when the referenced stage has no workdir', () => {
            const dockerfile: Dockerfile = {
                stages: { builder: { from: 'busybox' } },
                from: 'busybox',
                copy: { 'builder:./a.txt': './' },
            };

            expect(() => renderDockerfile(dockerfile)).toThrow(
                'stage builder must define workdir for copy file'
            );
        });

        it('fails on named stages copying from each other', () => {
            const dockerfile: Dockerfile = {
                stages: {
                    a: { from: 'busybox', workdir: '/a', copy: { 'b:x': './' } },
                    b: { from: 'busybox', workdir: '/b', copy: { 'a:y': './' } },
                },
            };

            let caught: unknown;
            try {
                renderDockerfile(dockerfile);
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(StagefileRuntimeError);
            expect(caught).toMatchObject({
                code: DockerfileErrorCode.STAGE_CYCLE,
                context: { stages: ['a', 'b'] },
            });
        });

        it('rejects an empty stage name before writing anything', () => {
            const dockerfile: Dockerfile = {
                stages: { '': { from: 'alpine', workdir: '/w' } },
                from: 'busybox',
                copy: { ':x': '/' },
            };
            const sink = new BufferSink();

            expect(() => serializeDockerfile(dockerfile, sink)).toThrow(
                expect.objectContaining({
                    code: DockerfileErrorCode.INVALID_STAGE_NAME,
                    scope: ErrorScope.DOCKERFILE,
                    type: ErrorType.USER,
                    message: "invalid stage name ''",
                })
            );
            expect(sink.isEmpty).toBe(true);
        });

        it('rejects a stage name containing a colon', () => {
            expect(() =>
                renderDockerfile({ stages: { 'a:b': { from: 'alpine', workdir: '/w' } } })
            ).toThrow("invalid stage name 'a:b'");
        });

        it('propagates sink failures unchanged', () => {
            const failure = new Error('disk full');
            const sink: DirectiveSink = {
                write: () => {
                    throw failure;
                },
            };

            expect(() => serializeDockerfile({ from: 'busybox' }, sink)).toThrow(failure);
        });
    });

    it('logs resolution and emission at debug level', () => {
        const logger = createMockLogger();

        renderDockerfile(multiStage(), { logger });

        expect(logger.createChild).toHaveBeenCalledWith(StagefileLogComponent.SERIALIZER);
        expect(logger.debug).toHaveBeenCalledWith('Planned stage order', {
            order: ['builder', 'builder2'],
        });
        expect(logger.debug).toHaveBeenCalledWith('Encoded stage builder', { directives: 3 });
        expect(logger.debug).toHaveBeenCalledWith('Encoded stage (final)', { directives: 4 });
    });
});

describe('orderStages', () => {
    it('falls back to name order when consumer counts tie', () => {
        expect(orderStages(['c', 'a', 'b'], createResolutionTable())).toEqual(['a', 'b', 'c']);
    });

    it('puts the most used stage first', () => {
        const table = createResolutionTable();
        getResolution(table, 'b').dependents.add('');
        getResolution(table, 'b').dependents.add('c');
        getResolution(table, 'a').dependents.add('');

        expect(orderStages(['a', 'b', 'c'], table)).toEqual(['b', 'a', 'c']);
    });

    it('rejects a stage that copies from itself', () => {
        const table = createResolutionTable();
        getResolution(table, 'a').dependents.add('a');

        expect(() => orderStages(['a'], table)).toThrow(
            expect.objectContaining({ code: DockerfileErrorCode.STAGE_CYCLE })
        );
    });
});
