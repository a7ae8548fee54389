/**
 * Output Capture Harness - Runs one implementation and records its output
 *
 * Every run gets a uniquely named buffer (`__<hook slug>_<seq>`). Output is
 * split into lines tagged with their stream:
 *
 * - callbacks write through the writers in their HookInvocation, so lines
 *   land in the buffer in exact call order across both streams
 * - subprocesses get one reader per pipe; order within a stream is exact,
 *   order across streams follows chunk arrival
 *
 * The implementation's exit status is returned unmodified. Failing to start
 * an implementation is a CaptureError, never an exit status.
 */

import { spawn, type ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';
import { createLoggers, type LoggerRegistry } from '../logger.js';
import { toSlug } from '../names.js';
import { normalizeSignal, signalExitCode, toNodeSignal } from '../signals/host.js';
import type { SignalRegistry } from '../signals/registry.js';
import { CaptureError, errorMessage } from '../types.js';
import { LineWriter, createCaptureBuffer } from './buffer.js';
import type {
    CallbackInvocable,
    CaptureBuffer,
    CaptureResult,
    Invocable,
    ProcessInvocable,
} from './types.js';

export interface CaptureHarnessOptions {
    loggers?: LoggerRegistry;
    /** When set, forwardSignals are relayed to subprocesses while they run */
    signals?: SignalRegistry;
    /** Default: INT and TERM */
    forwardSignals?: string[];
}

const SLUG_LENGTH = 40;

export class CaptureHarness {
    private seq = 0;
    private readonly loggers: LoggerRegistry;
    private readonly signals?: SignalRegistry;
    private readonly forwardSignals: string[];

    constructor(options: CaptureHarnessOptions = {}) {
        this.loggers = options.loggers ?? createLoggers();
        this.signals = options.signals;
        this.forwardSignals = (options.forwardSignals ?? ['INT', 'TERM']).map(normalizeSignal);
    }

    /** Number of buffers allocated so far */
    get sequence(): number {
        return this.seq;
    }

    /**
     * Allocate an empty, uniquely named buffer for a hook.
     */
    allocate(hookName: string): CaptureBuffer {
        this.seq++;
        return createCaptureBuffer(`__${toSlug(hookName, '_', SLUG_LENGTH)}_${this.seq}`);
    }

    /**
     * Run an implementation with `args`, capturing its output.
     *
     * @throws {CaptureError} when the implementation cannot be started
     */
    async run(hookName: string, invocable: Invocable, args: string[] = []): Promise<CaptureResult> {
        const buffer = this.allocate(hookName);
        const received: string[] = [];
        const exitCode = invocable.kind === 'callback'
            ? await this.runCallback(hookName, invocable, args, buffer)
            : await this.runProcess(hookName, invocable, args, buffer, received);

        this.loggers.get('hooks').echo(`${buffer.name}: ${buffer.lines.length} line(s), exit ${exitCode}`);
        await this.redeliver(received);
        return { buffer, exitCode };
    }

    /**
     * Signals relayed to a subprocess are dispatched again once the caller's
     * handlers are back, so an interrupt reaches them after the child exits.
     */
    private async redeliver(received: string[]): Promise<void> {
        if (!this.signals) return;
        for (const signal of received) {
            this.loggers.get('trap').echo(`redelivering ${signal} after subprocess exit`);
            await this.signals.deliver(signal);
        }
    }

    /** Restart buffer numbering (tests) */
    reset(): void {
        this.seq = 0;
    }

    private async runCallback(
        hookName: string,
        invocable: CallbackInvocable,
        args: string[],
        buffer: CaptureBuffer,
    ): Promise<number> {
        const stdout = new LineWriter(buffer, 'stdout');
        const stderr = new LineWriter(buffer, 'stderr');

        let exitCode: number;
        try {
            const result = await invocable.callback({
                hook: hookName,
                args: [...args],
                env: { ...invocable.env },
                stdout,
                stderr,
            });
            exitCode = typeof result === 'number' ? result : 0;
        } catch (err) {
            stdout.flush();
            stderr.flush();
            stderr.write(`${errorMessage(err)}\n`);
            exitCode = 1;
        }

        stdout.flush();
        stderr.flush();
        return exitCode;
    }

    private runProcess(
        hookName: string,
        invocable: ProcessInvocable,
        args: string[],
        buffer: CaptureBuffer,
        received: string[],
    ): Promise<number> {
        const { command } = invocable;

        return new Promise<number>((resolve, reject) => {
            const failed = (err: NodeJS.ErrnoException) =>
                new CaptureError({
                    message: `Failed to run ${command}: ${err.message}`,
                    hook: hookName,
                    details: { command, code: err.code ?? null },
                    cause: err,
                });

            let child: ChildProcessByStdio<null, Readable, Readable>;
            try {
                child = spawn(command, args, {
                    cwd: invocable.cwd,
                    env: invocable.env,
                    stdio: ['inherit', 'pipe', 'pipe'],
                });
            } catch (err) {
                reject(err instanceof Error ? failed(err) : err);
                return;
            }
            const running = child;

            const registry = this.signals;
            const forwarded = this.forwardSignals;
            if (registry) {
                registry.push(forwarded);
                for (const signal of forwarded) {
                    const forward = () => {
                        if (!received.includes(signal)) received.push(signal);
                        running.kill(toNodeSignal(signal));
                    };
                    registry.clear(signal);
                    registry.register(signal, forward);
                }
            }

            let settled = false;
            const settle = (complete: () => void) => {
                if (settled) return;
                settled = true;
                registry?.pop(forwarded);
                complete();
            };

            const stdout = new LineWriter(buffer, 'stdout');
            const stderr = new LineWriter(buffer, 'stderr');
            running.stdout.setEncoding('utf8');
            running.stderr.setEncoding('utf8');
            running.stdout.on('data', (chunk: string) => stdout.write(chunk));
            running.stderr.on('data', (chunk: string) => stderr.write(chunk));

            running.on('error', (err: NodeJS.ErrnoException) => {
                settle(() => reject(failed(err)));
            });

            running.on('close', (code, signal) => {
                settle(() => {
                    stdout.flush();
                    stderr.flush();
                    if (code !== null) {
                        resolve(code);
                    } else {
                        resolve(signal ? signalExitCode(normalizeSignal(signal)) : 1);
                    }
                });
            });
        });
    }
}
