/**
 * Centralized exit handling on top of the signal registry.
 *
 * Cleanup handlers are EXIT handlers on the CLI's registry (the engine's
 * end hook among them), so they run last-in first-out. exit() dispatches EXIT
 * explicitly (Node never delivers EXIT for process.exit()) and then exits.
 */

import chalk from 'chalk';
import {
    EXIT_SIGNAL,
    SignalRegistry,
    createLoggers,
    createProcessSignalHost,
    errorMessage,
    signalExitCode,
    type LoggerRegistry,
    type SignalHost,
} from '@lifehooks/core';

/** Process exit status, 0-255 */
export type ExitCode = number;

const CLEANUP_TIMEOUT_MS = 5000;

const loggers = createLoggers();
let pendingCode: ExitCode | undefined;
let signals = new SignalRegistry({ host: withPendingCode(createProcessSignalHost()), loggers });
let isExiting = false;

/**
 * Report the code exit() was asked for as the host's exit status, so EXIT
 * handlers (the end hook) see it before process.exit() sets it.
 */
function withPendingCode(host: SignalHost): SignalHost {
    return {
        attach: (signal, listener) => host.attach(signal, listener),
        detach: (signal, listener) => host.detach(signal, listener),
        exitCode: () => pendingCode ?? host.exitCode(),
        raise: (signal) => host.raise?.(signal),
    };
}

/** Signal registry shared by every command */
export function cliSignals(): SignalRegistry {
    return signals;
}

/** Tag loggers shared by every command */
export function cliLoggers(): LoggerRegistry {
    return loggers;
}

/**
 * Dispatch EXIT with a timeout.
 * @returns Whether dispatch finished in time, and how many handlers it had
 */
async function runCleanupHandlers(timeoutMs = CLEANUP_TIMEOUT_MS): Promise<{ timedOut: boolean; total: number }> {
    const total = signals.handlers(EXIT_SIGNAL).length;
    if (total === 0) {
        return { timedOut: false, total: 0 };
    }

    let timedOut = false;
    let timeoutId: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<void>((resolve) => {
        timeoutId = setTimeout(() => {
            timedOut = true;
            resolve();
        }, timeoutMs);
    });

    await Promise.race([signals.dispatch(EXIT_SIGNAL), timeoutPromise]);

    if (timeoutId) {
        clearTimeout(timeoutId);
    }

    return { timedOut, total };
}

/**
 * Run cleanup, then exit with `code`. Unlike exit() this never throws, so
 * signal handlers can call it from inside a dispatch.
 */
export async function requestExit(code: ExitCode): Promise<void> {
    if (isExiting) {
        // Recursive exit, e.g. a cleanup handler calling exit()
        console.error(
            chalk.yellow('Warning:'),
            'Recursive exit() call detected - exiting immediately',
            chalk.dim(`(requested code: ${code})`)
        );
        process.exit(code);
        return;
    }
    isExiting = true;
    pendingCode = code;

    try {
        const { timedOut, total } = await runCleanupHandlers();
        if (timedOut) {
            console.error(
                chalk.yellow('Warning:'),
                `Cleanup timed out after ${CLEANUP_TIMEOUT_MS / 1000}s`,
                chalk.dim(`(${total} handler(s) registered)`)
            );
        }
    } catch (error) {
        console.error(chalk.yellow('Warning:'), 'Cleanup orchestration failed:', errorMessage(error));
    } finally {
        process.exit(code);
    }
}

/**
 * Exit the process after running all registered cleanup handlers.
 *
 * Throws to stop execution at the call site; cleanup runs asynchronously and
 * the process exits once it completes (or times out).
 *
 * @throws ExitPendingError - always
 */
export function exit(code: ExitCode): never {
    void requestExit(code);
    throw new ExitPendingError(code);
}

/**
 * Error thrown by exit() to stop execution at the call site.
 */
export class ExitPendingError extends Error {
    public readonly exitCode: ExitCode;

    constructor(code: ExitCode) {
        super('Process exit pending');
        this.name = 'ExitPendingError';
        this.exitCode = code;
    }
}

function exitOnInterrupt(): void {
    void requestExit(signalExitCode('INT'));
}

function exitOnTerminate(): void {
    void requestExit(signalExitCode('TERM'));
}

/**
 * Route INT and TERM through the registry: run cleanup, then exit with the
 * conventional 128+signo status. Safe to call more than once.
 */
export function installSignalHandlers(): void {
    signals.register('INT', exitOnInterrupt);
    signals.register('TERM', exitOnTerminate);
}

/**
 * Reset exit state (for testing only).
 * @internal
 */
export function _resetForTesting(host?: SignalHost): void {
    signals.reset();
    isExiting = false;
    pendingCode = undefined;
    signals = new SignalRegistry({ host: withPendingCode(host ?? createProcessSignalHost()), loggers });
}
