import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ExecutableNotFoundError } from './errors';
import { findInPath, isExecutableFile, resolveExecutable } from './executableResolver';

describe('resolveExecutable', () => {
    let binDir: string;
    let emptyDir: string;

    beforeEach(() => {
        binDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cue-bin-'));
        emptyDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cue-empty-'));
    });

    afterEach(() => {
        fs.rmSync(binDir, { recursive: true, force: true });
        fs.rmSync(emptyDir, { recursive: true, force: true });
    });

    function writeTool(name: string, mode: number): string {
        const file = path.join(binDir, name);
        fs.writeFileSync(file, '#!/bin/sh\nexit 0\n');
        fs.chmodSync(file, mode);
        return file;
    }

    it('returns a configured executable path', () => {
        const tool = writeTool('my-cue', 0o755);
        expect(resolveExecutable(tool, { env: { PATH: emptyDir } })).toBe(tool);
    });

    it('rejects a configured path that is not executable', () => {
        const tool = writeTool('my-cue', 0o644);

        expect(() => resolveExecutable(tool)).toThrow(ExecutableNotFoundError);
        try {
            resolveExecutable(tool);
        } catch (error: unknown) {
            expect(error).toBeInstanceOf(ExecutableNotFoundError);
            if (error instanceof ExecutableNotFoundError) {
                expect(error.reason).toBe('configuredPath');
                expect(error.configuredPath).toBe(tool);
            }
        }
    });

    it('rejects a configured path that does not exist', () => {
        expect(() => resolveExecutable(path.join(binDir, 'missing'))).toThrow(ExecutableNotFoundError);
    });

    it('rejects a configured directory', () => {
        expect(isExecutableFile(binDir)).toBe(false);
        expect(() => resolveExecutable(binDir)).toThrow(ExecutableNotFoundError);
    });

    it('searches PATH when no path is configured', () => {
        const tool = writeTool('cue', 0o755);
        const env = { PATH: [emptyDir, '', binDir].join(':') };

        expect(resolveExecutable(undefined, { env, platform: 'linux' })).toBe(tool);
        expect(resolveExecutable('  ', { env, platform: 'linux' })).toBe(tool);
    });

    it('tries PATHEXT extensions on Windows', () => {
        const tool = writeTool('cue.exe', 0o755);
        const env = { PATH: `${emptyDir};${binDir}`, PATHEXT: '.BAT;.EXE' };

        expect(findInPath('cue', { env, platform: 'win32' })).toBe(tool);
    });

    it('skips non-executable candidates on PATH', () => {
        writeTool('cue', 0o644);
        expect(findInPath('cue', { env: { PATH: binDir }, platform: 'linux' })).toBeUndefined();
    });

    it('fails when the tool is not on PATH and no path is configured', () => {
        expect(() => resolveExecutable('', { env: { PATH: emptyDir }, platform: 'linux' }))
            .toThrow(new ExecutableNotFoundError('searchPath').message);
    });
});
