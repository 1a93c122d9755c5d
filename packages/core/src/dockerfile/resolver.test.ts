import { describe, it, expect } from 'vitest';
import { DockerfileErrorCode } from './error-codes.js';
import {
    FINAL_STAGE_ID,
    createResolutionTable,
    parseStageReference,
    resolveStage,
} from './resolver.js';
import type { Stage } from './schemas.js';

describe('parseStageReference', () => {
    it('splits on the first colon only', () => {
        expect(parseStageReference('builder:./a.txt')).toEqual({
            stageName: 'builder',
            path: './a.txt',
        });
        expect(parseStageReference('assets:c:/weird')).toEqual({
            stageName: 'assets',
            path: 'c:/weird',
        });
    });

    it('returns null for local sources', () => {
        expect(parseStageReference('./local/file')).toBeNull();
    });
});

describe('resolveStage', () => {
    const stages = new Map<string, Stage>([
        ['builder', { from: 'golang', workdir: '/go/src/' }],
        ['bare', { from: 'busybox' }],
    ]);

    it('records the consumer and the rewritten source', () => {
        const table = createResolutionTable();

        resolveStage(
            { copy: { 'builder:../bin/app': '/usr/bin/', 'README.md': '/' } },
            FINAL_STAGE_ID,
            stages,
            table
        );

        expect([...(table.get('builder')?.dependents ?? [])]).toEqual([FINAL_STAGE_ID]);
        expect([...(table.get(FINAL_STAGE_ID)?.rewrites ?? [])]).toEqual([
            ['builder:../bin/app', '--from=builder /go/bin/app'],
        ]);
    });

    it('fails for an undeclared stage', () => {
        expect(() =>
            resolveStage({ copy: { 'ghost:x': '/' } }, 'app', stages, createResolutionTable())
        ).toThrow(
            expect.objectContaining({
                code: DockerfileErrorCode.MISSING_STAGE,
                context: { stageName: 'ghost', source: 'ghost:x', consumer: 'app' },
            })
        );
    });

    it('fails for a stage without workdir', () => {
        expect(() =>
            resolveStage({ copy: { 'bare:x': '/' } }, 'app', stages, createResolutionTable())
        ).toThrow(expect.objectContaining({ code: DockerfileErrorCode.MISSING_WORKDIR }));
    });

    it('does nothing for stages without cross-stage copies', () => {
        const table = createResolutionTable();

        resolveStage({ from: 'busybox', copy: { a: 'b' } }, 'app', stages, table);

        expect(table.get('app')?.rewrites.size).toBe(0);
        expect(table.has('builder')).toBe(false);
    });
});
