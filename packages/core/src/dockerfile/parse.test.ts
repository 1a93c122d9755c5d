import { describe, it, expect } from 'vitest';
import { StagefileValidationError } from '../errors/StagefileValidationError.js';
import { parseDockerfile } from './parse.js';

describe('parseDockerfile', () => {
    it('stringifies numeric and boolean values', () => {
        const dockerfile = parseDockerfile({
            from: 'node:20',
            env: { PORT: 8080, DEBUG: false },
            expose: [8080],
        });

        expect(dockerfile.env).toEqual({ PORT: '8080', DEBUG: 'false' });
        expect(dockerfile.expose).toEqual(['8080']);
    });

    it('keeps named stages and image metadata', () => {
        const dockerfile = parseDockerfile({
            image: 'registry.local/app:1.0.0',
            stages: { builder: { from: 'golang:1.22', workdir: '/src' } },
            copy: { 'builder:/src/app': '/app' },
        });

        expect(dockerfile.image).toBe('registry.local/app:1.0.0');
        expect(dockerfile.stages?.builder?.workdir).toBe('/src');
    });

    it('rejects unknown keys with the offending path', () => {
        let caught: unknown;
        try {
            parseDockerfile({ stages: { builder: { form: 'golang' } } });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(StagefileValidationError);
        const issues = caught instanceof StagefileValidationError ? caught.issues : [];
        expect(issues).toHaveLength(1);
        expect(issues[0]?.path).toEqual(['stages', 'builder']);
        expect(issues[0]?.message).toContain("Unrecognized key(s) in object: 'form'");
    });

    it('rejects stage names that cannot be referenced', () => {
        expect(() => parseDockerfile({ stages: { 'my stage': { from: 'busybox' } } })).toThrow(
            StagefileValidationError
        );
    });
});
