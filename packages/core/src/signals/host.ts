/**
 * Signal names and the Node.js signal host
 *
 * Signals are tracked by their short upper-case name (INT, TERM, HUP...).
 * EXIT is the pseudo-signal for the end of the process; on Node it maps to
 * the `beforeExit` event, the last point where async work can still run.
 */

import { constants } from 'os';
import { SignalRegistryError } from '../types.js';
import type { LegacyDisposition, SignalHost } from './types.js';

export const EXIT_SIGNAL = 'EXIT';

function isNodeSignal(name: string): name is NodeJS.Signals {
    return Object.prototype.hasOwnProperty.call(constants.signals, name);
}

/**
 * Normalize a signal given by name or number.
 *
 * @example
 * ```typescript
 * normalizeSignal('SIGINT')  // 'INT'
 * normalizeSignal('int')     // 'INT'
 * normalizeSignal(2)         // 'INT'
 * normalizeSignal(0)         // 'EXIT'
 * normalizeSignal('exit')    // 'EXIT'
 * ```
 *
 * @throws {SignalRegistryError} for names and numbers the platform does not know
 */
export function normalizeSignal(input: string | number): string {
    const raw = String(input).trim();

    if (raw === '0') {
        return EXIT_SIGNAL;
    }

    if (/^\d+$/.test(raw)) {
        const signo = Number(raw);
        for (const [name, value] of Object.entries(constants.signals)) {
            if (value === signo) {
                return name.replace(/^SIG/, '');
            }
        }
        throw new SignalRegistryError({
            message: `Unknown signal number: ${raw}`,
            details: { signal: raw },
        });
    }

    const name = raw.toUpperCase().replace(/^SIG/, '');
    if (name === EXIT_SIGNAL || isNodeSignal(`SIG${name}`)) {
        return name;
    }

    throw new SignalRegistryError({
        message: `Unknown signal: ${raw}`,
        details: { signal: raw },
    });
}

/**
 * Exit status for a signal: 128 + signal number (shell convention).
 */
export function signalExitCode(signal: string): number {
    const name = `SIG${signal}`;
    return isNodeSignal(name) ? 128 + constants.signals[name] : 1;
}

/**
 * Node's name for a normalized signal (INT -> SIGINT).
 */
export function toNodeSignal(signal: string): NodeJS.Signals {
    const name = `SIG${signal}`;
    if (!isNodeSignal(name)) {
        throw new SignalRegistryError({
            message: `Unknown signal: ${signal}`,
            details: { signal },
        });
    }
    return name;
}

function exitCodeOf(proc: NodeJS.Process): number {
    const code = proc.exitCode;
    if (typeof code === 'number') {
        return code;
    }
    if (typeof code === 'string') {
        const parsed = Number.parseInt(code, 10);
        return Number.isNaN(parsed) ? 0 : parsed;
    }
    return 0;
}

/**
 * SignalHost backed by a Node.js process.
 */
export function createProcessSignalHost(proc: NodeJS.Process = process): SignalHost {
    return {
        attach(signal: string, listener: () => void): LegacyDisposition | undefined {
            if (signal === EXIT_SIGNAL) {
                const previous = proc.listeners('beforeExit');
                for (const fn of previous) {
                    proc.removeListener('beforeExit', fn);
                }
                proc.on('beforeExit', listener);

                if (previous.length === 0) return undefined;
                return {
                    description: `${previous.length} beforeExit listener(s)`,
                    invoke: () => {
                        for (const fn of previous) fn(exitCodeOf(proc));
                    },
                    reinstall: () => {
                        for (const fn of previous) proc.on('beforeExit', fn);
                    },
                };
            }

            const name = toNodeSignal(signal);
            const previous = proc.listeners(name);
            for (const fn of previous) {
                proc.removeListener(name, fn);
            }
            proc.on(name, listener);

            if (previous.length === 0) return undefined;
            return {
                description: `${previous.length} ${name} listener(s)`,
                invoke: () => {
                    for (const fn of previous) fn(name);
                },
                reinstall: () => {
                    for (const fn of previous) proc.on(name, fn);
                },
            };
        },

        detach(signal: string, listener: () => void): void {
            if (signal === EXIT_SIGNAL) {
                proc.removeListener('beforeExit', listener);
            } else {
                proc.removeListener(toNodeSignal(signal), listener);
            }
        },

        exitCode: () => exitCodeOf(proc),

        raise(signal: string): void {
            proc.kill(proc.pid, toNodeSignal(signal));
        },
    };
}
