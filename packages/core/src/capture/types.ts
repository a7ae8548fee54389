/**
 * Capture Harness Types
 */

import type { StreamName, TextSink } from '../types.js';

/** Environment passed to implementations */
export type HookEnv = Record<string, string | undefined>;

/**
 * One captured output line, without its newline
 */
export interface CapturedLine {
    stream: StreamName;
    text: string;
}

/**
 * Ordered, stream-tagged output of one implementation invocation.
 * Owned by that invocation; discarded once the middleware has consumed it.
 */
export interface CaptureBuffer {
    /** `__<hook slug>_<seq>` */
    readonly name: string;
    readonly lines: CapturedLine[];
}

/**
 * What an in-process implementation receives. `env` is a private copy:
 * changes to it never reach the coordinator.
 */
export interface HookInvocation {
    hook: string;
    args: string[];
    env: HookEnv;
    stdout: TextSink;
    stderr: TextSink;
}

/**
 * In-process implementation. The returned number is the exit status;
 * returning nothing means 0, throwing means 1.
 */
export type HookCallback = (invocation: HookInvocation) => number | void | Promise<number | void>;

export interface CallbackInvocable {
    kind: 'callback';
    callback: HookCallback;
    env: HookEnv;
}

export interface ProcessInvocable {
    kind: 'process';
    /** Executable path */
    command: string;
    env: HookEnv;
    cwd?: string;
}

export type Invocable = CallbackInvocable | ProcessInvocable;

export interface CaptureResult {
    buffer: CaptureBuffer;
    exitCode: number;
}
