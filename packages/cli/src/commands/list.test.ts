/**
 * Tests for the list command
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../exit.js', async () => {
    const core = await import('@lifehooks/core');
    const loggers = core.createLoggers({ debug: '' });
    const signals = new core.SignalRegistry({
        loggers,
        host: { attach: () => undefined, detach: () => {}, exitCode: () => 0 },
    });
    return {
        exit: vi.fn((code: number) => {
            throw new Error(`exit(${code})`);
        }),
        cliSignals: () => signals,
        cliLoggers: () => loggers,
    };
});

import { listCommand } from './list.js';

describe('listCommand', () => {
    let hooksDir: string;
    let output: string[];

    beforeEach(() => {
        hooksDir = fs.mkdtempSync(path.join(os.tmpdir(), 'list-command-'));
        output = [];
        vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
            output.push(args.map(String).join(' '));
        });
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        fs.rmSync(hooksDir, { recursive: true, force: true });
    });

    function touch(name: string, mode = 0o755): void {
        const file = path.join(hooksDir, name);
        fs.writeFileSync(file, '#!/bin/sh\n');
        fs.chmodSync(file, mode);
    }

    it('should list every hook found in the directory as JSON', () => {
        touch('deploy-20_notify.sh');
        touch('deploy-10_build.sh');
        touch('test_unit.sh');

        listCommand([], { dir: hooksDir, json: true });

        expect(output).toHaveLength(1);
        expect(JSON.parse(output[0])).toEqual([
            {
                name: 'deploy',
                contexts: ['cli'],
                middleware: 'default',
                implementations: [
                    { kind: 'script', label: 'deploy-10_build.sh', mode: 'exec' },
                    { kind: 'script', label: 'deploy-20_notify.sh', mode: 'exec' },
                ],
            },
            {
                name: 'test',
                contexts: ['cli'],
                middleware: 'default',
                implementations: [{ kind: 'script', label: 'test_unit.sh', mode: 'exec' }],
            },
        ]);
    });

    it('should list only the named hooks', () => {
        touch('deploy-10_build.sh');
        touch('test_unit.sh');

        listCommand(['test'], { dir: hooksDir, json: true });

        expect(JSON.parse(output[0])).toEqual([
            {
                name: 'test',
                contexts: ['cli'],
                middleware: 'default',
                implementations: [{ kind: 'script', label: 'test_unit.sh', mode: 'exec' }],
            },
        ]);
    });

    it('should leave out scripts that cannot run in exec mode', () => {
        touch('deploy-10_build.sh');
        touch('deploy-20_notes.sh', 0o644);

        listCommand(['deploy'], { dir: hooksDir, json: true });

        expect(JSON.parse(output[0])[0].implementations).toEqual([
            { kind: 'script', label: 'deploy-10_build.sh', mode: 'exec' },
        ]);
    });

    it('should say so when the directory has no hooks', () => {
        listCommand([], { dir: hooksDir });

        expect(output).toHaveLength(1);
        expect(output[0]).toContain('No hooks found in');
        expect(output[0]).toContain(hooksDir);
    });

    it('should print one line per implementation', () => {
        touch('deploy-10_build.sh');

        listCommand([], { dir: hooksDir });

        expect(output).toHaveLength(2);
        expect(output[0]).toContain('deploy');
        expect(output[1]).toContain('deploy-10_build.sh');
        expect(output[1]).toContain('[exec]');
    });

    it('should exit with 1 for an invalid hook name', () => {
        expect(() => listCommand(['no way'], { dir: hooksDir })).toThrow('exit(1)');
    });
});
