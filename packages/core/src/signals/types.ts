/**
 * Signal Registry Types
 */

/**
 * Callback run when a signal is dispatched. May be async; dispatch awaits it.
 */
export type SignalHandler = (signal: string) => void | Promise<void>;

/**
 * Whatever the runtime had wired for a signal before the registry took over.
 */
export interface LegacyDisposition {
    /** Short human-readable description for listings */
    readonly description: string;
    /** Run the previous handler(s) */
    invoke(signal: string): void;
    /** Put the previous handler(s) back */
    reinstall(): void;
}

/**
 * The runtime surface the registry needs. The Node implementation wraps
 * `process`; tests use an in-process stand-in.
 */
export interface SignalHost {
    /**
     * Take over `signal`: detach what was there, wire `listener` instead and
     * return the detached disposition (undefined when nothing was wired).
     */
    attach(signal: string, listener: () => void): LegacyDisposition | undefined;
    /** Remove `listener` from `signal` */
    detach(signal: string, listener: () => void): void;
    /** Exit status the process is heading for (passed to EXIT handlers' consumers) */
    exitCode(): number;
    /** Send `signal` to the current process, for its default action */
    raise?(signal: string): void;
}

export interface SignalRegisterOptions {
    /** Add the handler even if it is already registered for the signal */
    allowDuplicates?: boolean;
}

/**
 * Diagnostic view of one signal
 */
export interface SignalListing {
    signal: string;
    /** Handler names in registration order */
    handlers: string[];
    /** Description of the legacy disposition, if one was captured */
    legacy?: string;
}
