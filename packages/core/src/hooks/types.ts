/**
 * Hook Engine Types
 */

import type { HookCallback, HookEnv } from '../capture/types.js';
import type { ExecMode, TextSink } from '../types.js';

// =============================================================================
// Declarations and implementations
// =============================================================================

export interface HookDeclaration {
    name: string;
    /** Every context that declared the hook, first one first */
    contexts: string[];
}

/** The callback found under `${functionPrefix}${hook}` */
export interface InlineImplementation {
    kind: 'inline';
    hook: string;
    functionName: string;
    callback: HookCallback;
}

export interface RegisteredImplementation {
    kind: 'registered';
    hook: string;
    sortKey: string;
    callback: HookCallback;
}

export interface ScriptImplementation {
    kind: 'script';
    hook: string;
    /** File name minus the hook prefix and extension */
    sortKey: string;
    path: string;
    fileName: string;
    mode: ExecMode;
}

export type MergedImplementation = RegisteredImplementation | ScriptImplementation;

export type Implementation = InlineImplementation | MergedImplementation;

/**
 * Everything that would run for one hook, in run order
 */
export interface ImplementationPlan {
    inline?: InlineImplementation;
    merged: MergedImplementation[];
}

// =============================================================================
// Running
// =============================================================================

/**
 * Progress of one do() call. Routing or a forced exit ends in
 * `terminated`; everything else ends in `done`.
 */
export type HookPhase = 'pending' | 'inline' | 'merged' | 'done' | 'terminated';

/**
 * What a source-mode implementation receives: the coordinator's live
 * environment and real output streams.
 */
export interface SourceContext {
    hook: string;
    args: string[];
    env: HookEnv;
    stdout: TextSink;
    stderr: TextSink;
}

/**
 * Shape of a module loaded in source mode or through a route directive
 */
export interface SourceModule {
    run(context: SourceContext): number | void | Promise<number | void>;
}

export interface HookRegisterOptions {
    /** Replace an existing registration with the same sort key */
    override?: boolean;
}

// =============================================================================
// Diagnostics
// =============================================================================

export interface ImplementationListing {
    kind: Implementation['kind'];
    /** Function name, sort key or file name */
    label: string;
    mode: ExecMode;
}

export interface HookListing {
    name: string;
    contexts: string[];
    middleware: string;
    implementations: ImplementationListing[];
}
