/**
 * Signal Registry - Ordered handler lists per lifecycle signal
 *
 * The registry owns the runtime disposition of every signal it has seen:
 * on first registration it detaches whatever was wired before (the legacy
 * disposition) and installs its own dispatcher. Dispatch runs the legacy
 * disposition first, then the registered handlers last-in first-out.
 *
 * Handler lists can be snapshotted with push() and restored with pop() to
 * scope temporary overrides, e.g. around a single subprocess.
 */

import { createLoggers, type LoggerRegistry } from '../logger.js';
import { SignalRegistryError, errorMessage } from '../types.js';
import { EXIT_SIGNAL, createProcessSignalHost, normalizeSignal } from './host.js';
import type {
    LegacyDisposition,
    SignalRegisterOptions,
    SignalHandler,
    SignalHost,
    SignalListing,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

interface SignalRecord {
    handlers: SignalHandler[];
    legacy?: LegacyDisposition;
    dispatcher: () => void;
    /** EXIT runs once per installation */
    exited: boolean;
}

/** undefined: the signal was not installed when the snapshot was taken */
type Snapshot = Map<string, SignalHandler[] | undefined>;

export interface SignalRegistryOptions {
    host?: SignalHost;
    loggers?: LoggerRegistry;
}

function handlerName(handler: SignalHandler): string {
    return handler.name || '(anonymous)';
}

// =============================================================================
// Registry
// =============================================================================

export class SignalRegistry {
    private readonly host: SignalHost;
    private readonly loggers: LoggerRegistry;
    private readonly records = new Map<string, SignalRecord>();
    private stack: Snapshot[] = [];

    constructor(options: SignalRegistryOptions = {}) {
        this.host = options.host ?? createProcessSignalHost();
        this.loggers = options.loggers ?? createLoggers();
    }

    /** Snapshot depth */
    get level(): number {
        return this.stack.length;
    }

    /**
     * Add a handler for a signal.
     *
     * @returns false when the handler was already registered and duplicates
     * were not allowed
     */
    register(signal: string | number, handler: SignalHandler, options: SignalRegisterOptions = {}): boolean {
        const name = normalizeSignal(signal);
        const record = this.install(name);

        if (!options.allowDuplicates && record.handlers.includes(handler)) {
            this.loggers.get('trap').echo(`${handlerName(handler)} already registered for ${name}`);
            return false;
        }

        record.handlers.push(handler);
        this.loggers.get('trap').echo(`registered ${handlerName(handler)} for ${name}`);
        return true;
    }

    /**
     * Remove a handler. Only the most recent registration is removed when
     * duplicates exist. No-op for unknown handlers.
     */
    unregister(signal: string | number, handler: SignalHandler): void {
        const record = this.records.get(normalizeSignal(signal));
        if (!record) return;

        const index = record.handlers.lastIndexOf(handler);
        if (index !== -1) {
            record.handlers.splice(index, 1);
        }
    }

    /**
     * Run the legacy disposition, then every handler LIFO.
     * Never rejects: handler failures are logged and the next handler runs.
     */
    async dispatch(signal: string | number): Promise<void> {
        const name = normalizeSignal(signal);
        const record = this.records.get(name);
        if (!record) return;

        if (name === EXIT_SIGNAL) {
            if (record.exited) return;
            record.exited = true;
        }

        const trap = this.loggers.get('trap');
        const error = this.loggers.get('error');
        trap.echo(`dispatching ${name} (${record.handlers.length} handler(s))`);

        if (record.legacy) {
            try {
                record.legacy.invoke(name);
            } catch (err) {
                error.echo(`legacy ${name} handler failed: ${errorMessage(err)}`);
            }
        }

        for (const handler of [...record.handlers].reverse()) {
            try {
                await handler(name);
            } catch (err) {
                error.echo(`${name} handler ${handlerName(handler)} failed: ${errorMessage(err)}`);
            }
        }
    }

    /**
     * Snapshot the handler lists of the given signals (default: every
     * installed signal).
     *
     * @returns the new snapshot level
     */
    push(signals?: Array<string | number>): number {
        const names = signals ? signals.map(normalizeSignal) : [...this.records.keys()];
        const snapshot: Snapshot = new Map();
        for (const name of names) {
            const record = this.records.get(name);
            snapshot.set(name, record ? [...record.handlers] : undefined);
        }
        this.stack.push(snapshot);
        this.loggers.get('trap').echo(`push level ${this.stack.length}: ${names.join(' ') || '(none)'}`);
        return this.stack.length;
    }

    /**
     * Restore the handler lists saved by the most recent push(). With
     * `signals`, only those signals are restored from the snapshot.
     *
     * @returns the snapshot level after popping
     * @throws {SignalRegistryError} when there is nothing to pop
     */
    pop(signals?: Array<string | number>): number {
        const snapshot = this.stack.pop();
        if (!snapshot) {
            throw new SignalRegistryError({
                message: 'Signal stack is empty: nothing to pop',
                details: { level: 0 },
            });
        }

        const only = signals ? new Set(signals.map(normalizeSignal)) : undefined;
        for (const [name, handlers] of snapshot) {
            if (only && !only.has(name)) continue;
            if (handlers === undefined) {
                this.restore(name);
            } else {
                this.install(name).handlers = [...handlers];
            }
        }

        this.loggers.get('trap').echo(`pop to level ${this.stack.length}`);
        return this.stack.length;
    }

    /**
     * Detach the dispatcher, put the legacy disposition back and forget
     * every handler for the signal.
     */
    restore(signal: string | number): void {
        const name = normalizeSignal(signal);
        const record = this.records.get(name);
        if (!record) return;

        this.host.detach(name, record.dispatcher);
        record.legacy?.reinstall();
        this.records.delete(name);
        this.loggers.get('trap').echo(`restored ${name}`);
    }

    /**
     * Drop the handlers but keep the dispatcher and legacy disposition.
     */
    clear(signal: string | number): void {
        const record = this.records.get(normalizeSignal(signal));
        if (record) {
            record.handlers = [];
        }
    }

    /** Current handlers for a signal, in registration order */
    handlers(signal: string | number): SignalHandler[] {
        return [...(this.records.get(normalizeSignal(signal))?.handlers ?? [])];
    }

    list(signals?: Array<string | number>): SignalListing[] {
        const names = signals ? signals.map(normalizeSignal) : [...this.records.keys()];
        const listings: SignalListing[] = [];
        for (const name of names) {
            const record = this.records.get(name);
            if (!record) continue;
            listings.push({
                signal: name,
                handlers: record.handlers.map(handlerName),
                ...(record.legacy ? { legacy: record.legacy.description } : {}),
            });
        }
        return listings;
    }

    /**
     * Deliver a signal as if it arrived from outside: dispatch when the
     * registry owns it, otherwise hand it to the host for its default action.
     */
    async deliver(signal: string | number): Promise<void> {
        const name = normalizeSignal(signal);
        if (this.records.has(name)) {
            await this.dispatch(name);
        } else if (this.host.raise) {
            this.loggers.get('trap').echo(`raising ${name}`);
            this.host.raise(name);
        }
    }

    /** Exit status the host process is heading for */
    exitCode(): number {
        return this.host.exitCode();
    }

    /**
     * Restore every signal and drop the snapshot stack.
     */
    reset(): void {
        for (const name of [...this.records.keys()]) {
            this.restore(name);
        }
        this.stack = [];
    }

    private install(name: string): SignalRecord {
        const existing = this.records.get(name);
        if (existing) return existing;

        const record: SignalRecord = {
            handlers: [],
            dispatcher: () => {
                void this.dispatch(name);
            },
            exited: false,
        };
        record.legacy = this.host.attach(name, record.dispatcher);
        this.records.set(name, record);
        return record;
    }
}
