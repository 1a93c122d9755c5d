import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import * as path from 'path';
import { ErrorScope, ErrorType, StagefileValidationError } from '@stagefile/core';
import { createMockLogger } from '@stagefile/core/test-utils';
import { loadStagefileConfig } from './loader.js';
import { ConfigErrorCode } from './error-codes.js';

let tmpDir: string;
let tmpFile: string;

beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stagefile-loader-'));
    tmpFile = path.join(tmpDir, 'stagefile.yml');
});

afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('loadStagefileConfig', () => {
    it('loads a multi-stage description', async () => {
        await fs.writeFile(
            tmpFile,
            `
image: registry.local/todo:1.0.0
stages:
  builder:
    from: golang:1.22
    workdir: /go/src
    run:
      - go build -o /go/bin/todo ./cmd/todo
from: alpine:3.20
env:
  PORT: 8080
copy:
  builder:../bin/todo: /usr/local/bin/
expose:
  - 8080
cmd: [todo, serve]
`
        );
        const logger = createMockLogger();

        const config = await loadStagefileConfig(tmpFile, logger);

        expect(config.image).toBe('registry.local/todo:1.0.0');
        expect(config.stages?.builder?.run).toEqual(['go build -o /go/bin/todo ./cmd/todo']);
        expect(config.env).toEqual({ PORT: '8080' });
        expect(config.copy).toEqual({ 'builder:../bin/todo': '/usr/local/bin/' });
        expect(config.expose).toEqual(['8080']);
        expect(config.cmd).toEqual(['todo', 'serve']);
        expect(logger.debug).toHaveBeenCalledWith(`Loaded stagefile ${tmpFile}`, {
            stages: ['builder'],
        });
    });

    it('treats keys without a value as absent', async () => {
        await fs.writeFile(tmpFile, 'from: busybox\nworkdir:\nenv:\n');

        const config = await loadStagefileConfig(tmpFile);

        expect(config).toEqual({ from: 'busybox' });
    });

    it('reads an empty file as an empty description', async () => {
        await fs.writeFile(tmpFile, '');

        expect(await loadStagefileConfig(tmpFile)).toEqual({});
    });

    it('throws with file not found code when the file does not exist', async () => {
        await expect(loadStagefileConfig(path.join(tmpDir, 'missing.yml'))).rejects.toThrow(
            expect.objectContaining({
                code: ConfigErrorCode.FILE_NOT_FOUND,
                scope: ErrorScope.CONFIG,
                type: ErrorType.USER,
            })
        );
    });

    it('throws with parse error code when the content is invalid YAML', async () => {
        await fs.writeFile(tmpFile, 'from: [busybox\n');

        await expect(loadStagefileConfig(tmpFile)).rejects.toThrow(
            expect.objectContaining({ code: ConfigErrorCode.PARSE_ERROR })
        );
    });

    it('throws a validation error for unknown keys', async () => {
        await fs.writeFile(tmpFile, 'from: busybox\nentry: [sh]\n');

        await expect(loadStagefileConfig(tmpFile)).rejects.toBeInstanceOf(
            StagefileValidationError
        );
    });
});
