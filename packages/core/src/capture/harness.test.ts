/**
 * Tests for the capture harness with real shell scripts and in-process callbacks
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLoggers } from '../logger.js';
import { CaptureError } from '../types.js';
import { SignalRegistry } from '../signals/registry.js';
import type { LegacyDisposition, SignalHost } from '../signals/types.js';
import { LineWriter, bufferText, createCaptureBuffer } from './buffer.js';
import { CaptureHarness } from './harness.js';

const quiet = () => createLoggers({ debug: '', sink: { write: () => true } });

function writeScript(dir: string, name: string, body: string, mode = 0o755): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, `#!/bin/sh\n${body}\n`);
    fs.chmodSync(file, mode);
    return file;
}

describe('LineWriter', () => {
    it('should split chunks into lines and hold partial lines until flush', () => {
        const buffer = createCaptureBuffer('__test_1');
        const writer = new LineWriter(buffer, 'stdout');

        writer.write('one\ntw');
        writer.write('o\nthree');
        expect(buffer.lines.map((line) => line.text)).toEqual(['one', 'two']);

        writer.flush();
        expect(buffer.lines).toEqual([
            { stream: 'stdout', text: 'one' },
            { stream: 'stdout', text: 'two' },
            { stream: 'stdout', text: 'three' },
        ]);
    });

    it('should keep empty lines', () => {
        const buffer = createCaptureBuffer('__test_1');
        new LineWriter(buffer, 'stderr').write('a\n\nb\n');

        expect(bufferText(buffer)).toBe('a\n\nb\n');
    });
});

describe('CaptureHarness', () => {
    let harness: CaptureHarness;
    let tmpDir: string;

    beforeEach(() => {
        harness = new CaptureHarness({ loggers: quiet() });
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'capture-test-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('buffer names', () => {
        it('should combine the hook slug with an increasing sequence', () => {
            expect(harness.allocate('Pre Deploy!').name).toBe('__pre_deploy_1');
            expect(harness.allocate('build').name).toBe('__build_2');
            expect(harness.sequence).toBe(2);
        });

        it('should truncate long hook names', () => {
            const name = harness.allocate('a'.repeat(60)).name;
            expect(name).toBe(`__${'a'.repeat(40)}_1`);
        });

        it('should restart numbering after reset', () => {
            harness.allocate('x');
            harness.reset();
            expect(harness.allocate('x').name).toBe('__x_1');
        });
    });

    describe('callbacks', () => {
        it('should capture both streams in call order', async () => {
            const { buffer, exitCode } = await harness.run('deploy', {
                kind: 'callback',
                env: {},
                callback: ({ stdout, stderr }) => {
                    stdout.write('first\n');
                    stderr.write('second\n');
                    stdout.write('third\n');
                },
            });

            expect(exitCode).toBe(0);
            expect(buffer.lines).toEqual([
                { stream: 'stdout', text: 'first' },
                { stream: 'stderr', text: 'second' },
                { stream: 'stdout', text: 'third' },
            ]);
        });

        it('should return the callback status unmodified', async () => {
            const { exitCode } = await harness.run('deploy', {
                kind: 'callback',
                env: {},
                callback: async () => 7,
            });

            expect(exitCode).toBe(7);
        });

        it('should pass args and a private copy of the environment', async () => {
            const env = { STAGE: 'test' };
            let seenArgs: string[] = [];

            await harness.run(
                'deploy',
                {
                    kind: 'callback',
                    env,
                    callback: (invocation) => {
                        seenArgs = invocation.args;
                        invocation.env.STAGE = 'changed';
                        invocation.env.EXTRA = '1';
                    },
                },
                ['--fast', 'eu'],
            );

            expect(seenArgs).toEqual(['--fast', 'eu']);
            expect(env).toEqual({ STAGE: 'test' });
        });

        it('should turn a thrown error into status 1 with the message on stderr', async () => {
            const { buffer, exitCode } = await harness.run('deploy', {
                kind: 'callback',
                env: {},
                callback: ({ stdout }) => {
                    stdout.write('partial');
                    throw new Error('broken');
                },
            });

            expect(exitCode).toBe(1);
            expect(buffer.lines).toEqual([
                { stream: 'stdout', text: 'partial' },
                { stream: 'stderr', text: 'broken' },
            ]);
        });
    });

    describe('processes', () => {
        it('should capture stdout and stderr and return the exit code', async () => {
            const script = writeScript(tmpDir, 'build-compile', 'echo out\necho err 1>&2\nexit 2');

            const { buffer, exitCode } = await harness.run('build', { kind: 'process', command: script, env: {} });

            expect(exitCode).toBe(2);
            expect(bufferText(buffer, 'stdout')).toBe('out\n');
            expect(bufferText(buffer, 'stderr')).toBe('err\n');
        });

        it('should keep order within a stream', async () => {
            const script = writeScript(tmpDir, 'build-lines', 'for i in 1 2 3 4 5; do echo "line $i"; done');

            const { buffer } = await harness.run('build', { kind: 'process', command: script, env: {} });

            expect(buffer.lines.map((line) => line.text)).toEqual([
                'line 1',
                'line 2',
                'line 3',
                'line 4',
                'line 5',
            ]);
        });

        it('should pass args, env and cwd', async () => {
            const script = writeScript(tmpDir, 'build-env', 'echo "$1:$2:$STAGE:$(pwd)"');

            const { buffer } = await harness.run(
                'build',
                { kind: 'process', command: script, env: { STAGE: 'ci', PATH: process.env.PATH }, cwd: tmpDir },
                ['a', 'b'],
            );

            expect(buffer.lines).toEqual([
                { stream: 'stdout', text: `a:b:ci:${fs.realpathSync(tmpDir)}` },
            ]);
        });

        it('should keep a trailing line without newline', async () => {
            const script = writeScript(tmpDir, 'build-printf', "printf 'no newline'");

            const { buffer } = await harness.run('build', { kind: 'process', command: script, env: {} });

            expect(buffer.lines).toEqual([{ stream: 'stdout', text: 'no newline' }]);
        });

        it('should report 128 + signo when the process is killed', async () => {
            const script = writeScript(tmpDir, 'build-suicide', 'kill -TERM $$\nsleep 5');

            const { exitCode } = await harness.run('build', {
                kind: 'process',
                command: script,
                env: { PATH: process.env.PATH },
            });

            expect(exitCode).toBe(143);
        });

        it('should throw CaptureError when the command does not exist', async () => {
            await expect(
                harness.run('build', { kind: 'process', command: path.join(tmpDir, 'missing'), env: {} }),
            ).rejects.toBeInstanceOf(CaptureError);
        });

        it('should throw CaptureError when the file is not executable', async () => {
            const script = writeScript(tmpDir, 'build-noexec', 'echo hi', 0o644);

            const error = await harness
                .run('build', { kind: 'process', command: script, env: {} })
                .catch((err: unknown) => err);

            expect(error).toBeInstanceOf(CaptureError);
            expect(error).toMatchObject({ hook: 'build', details: { command: script, code: 'EACCES' } });
        });
    });

    describe('signal forwarding', () => {
        it('should scope forwarding handlers to the subprocess', async () => {
            const host: SignalHost = {
                attach: (): LegacyDisposition | undefined => undefined,
                detach: () => {},
                exitCode: () => 0,
            };
            const signals = new SignalRegistry({ host, loggers: quiet() });
            const outer = () => {};
            signals.register('INT', outer);
            harness = new CaptureHarness({ loggers: quiet(), signals });

            let during: string[] = [];
            const script = writeScript(tmpDir, 'build-wait', 'echo started');
            const pending = harness.run('build', { kind: 'process', command: script, env: {} });
            during = signals.list(['INT']).flatMap((listing) => listing.handlers);
            await pending;

            expect(during).toEqual(['forward']);
            expect(signals.handlers('INT')).toEqual([outer]);
            expect(signals.list(['TERM'])).toEqual([]);
            expect(signals.level).toBe(0);
        });

        it('should redeliver a forwarded signal once the caller handlers are back', async () => {
            const host: SignalHost = {
                attach: (): LegacyDisposition | undefined => undefined,
                detach: () => {},
                exitCode: () => 0,
            };
            const signals = new SignalRegistry({ host, loggers: quiet() });
            const seen: string[] = [];
            signals.register('INT', function callerInt(signal: string) {
                seen.push(`${signal} at level ${signals.level}`);
            });
            harness = new CaptureHarness({ loggers: quiet(), signals });

            const script = writeScript(tmpDir, 'build-slow', 'exec sleep 5');
            const pending = harness.run('build', { kind: 'process', command: script, env: { PATH: '/usr/bin:/bin' } });
            await signals.dispatch('INT');
            expect(seen).toEqual([]);

            const result = await pending;

            expect(result.exitCode).toBe(130);
            expect(seen).toEqual(['INT at level 0']);
            expect(signals.list(['INT'])).toEqual([{ signal: 'INT', handlers: ['callerInt'] }]);
        });
    });
});
