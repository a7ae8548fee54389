/**
 * Shared types and error classes for the hook engine.
 */

// =============================================================================
// Shared Types
// =============================================================================

/**
 * How a script implementation runs:
 * - exec: isolated subprocess, output captured and passed through middleware
 * - source: loaded into the coordinator process with live state, no capture
 */
export type ExecMode = 'exec' | 'source';

/** Which stream a captured line came from */
export type StreamName = 'stdout' | 'stderr';

/**
 * Anything text can be written to. `process.stdout`, `process.stderr`
 * and the capture harness line writers all satisfy it.
 */
export interface TextSink {
    write(chunk: string): unknown;
}

/**
 * The real output streams of the coordinator.
 */
export interface OutputStreams {
    stdout: TextSink;
    stderr: TextSink;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Context carried by every engine error
 */
export interface HookErrorContext {
    message: string;
    /** Hook the failing operation targeted, if any */
    hook?: string;
    /** Extra detail lines shown by toDetailedString() */
    details?: Record<string, string | number | null>;
}

/**
 * Base class for engine-level failures (declaration, registration, capture,
 * contract, signal registry, config). Implementation failures are not errors:
 * they travel as exit codes.
 */
export class HookError extends Error {
    public readonly hook?: string;
    public readonly details: Record<string, string | number | null>;

    constructor(context: HookErrorContext) {
        super(context.message);
        this.name = 'HookError';
        this.hook = context.hook;
        this.details = context.details ?? {};
    }

    /**
     * Multi-line description for logs and CLI error output
     */
    toDetailedString(): string {
        const lines = [`${this.name}: ${this.message}`];
        if (this.hook) {
            lines.push(`  hook: ${this.hook}`);
        }
        for (const [key, value] of Object.entries(this.details)) {
            lines.push(`  ${key}: ${value === null ? '(none)' : value}`);
        }
        return lines.join('\n');
    }
}

/** Invalid hook name or malformed declaration */
export class DeclarationError extends HookError {
    constructor(context: HookErrorContext) {
        super(context);
        this.name = 'DeclarationError';
    }
}

/** Missing callback, duplicate sort key, unknown registration */
export class RegistrationError extends HookError {
    constructor(context: HookErrorContext) {
        super(context);
        this.name = 'RegistrationError';
    }
}

/**
 * The harness could not run or wire up an implementation.
 * Distinct from the implementation exiting non-zero.
 */
export class CaptureError extends HookError {
    constructor(context: HookErrorContext & { cause?: unknown }) {
        super(context);
        this.name = 'CaptureError';
        this.cause = context.cause;
    }
}

/** Malformed contract directive or middleware called without `--` */
export class ContractError extends HookError {
    constructor(context: HookErrorContext) {
        super(context);
        this.name = 'ContractError';
    }
}

/** Unknown signal name, popping an empty snapshot stack */
export class SignalRegistryError extends HookError {
    constructor(context: HookErrorContext) {
        super(context);
        this.name = 'SignalRegistryError';
    }
}

/** Invalid configuration value or file */
export class ConfigError extends HookError {
    constructor(context: HookErrorContext) {
        super(context);
        this.name = 'ConfigError';
    }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
