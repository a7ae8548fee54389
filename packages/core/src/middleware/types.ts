/**
 * Middleware Types
 *
 * A middleware receives one implementation's capture buffer and exit status
 * and decides what reaches the real output streams, what changes in the
 * coordinator's environment and which status the implementation ends with.
 */

import type { CaptureBuffer, HookEnv } from '../capture/types.js';
import type { LoggerRegistry } from '../logger.js';
import type { OutputStreams } from '../types.js';
import type { FlowControl } from './flow.js';

/** Literal token that must precede the implementation's arguments */
export const ARGUMENT_SEPARATOR = '--';

/**
 * Everything a middleware may read or act on
 */
export interface MiddlewareScope {
    hookName: string;
    /** Status the implementation returned */
    exitCode: number;
    capture: CaptureBuffer;
    /** The coordinator's live environment */
    env: HookEnv;
    flow: FlowControl;
    output: OutputStreams;
    loggers: LoggerRegistry;
}

/**
 * Called as `middleware(scope, '--', ...implementationArgs)`.
 * The returned number is the implementation's effective status.
 */
export type Middleware = (scope: MiddlewareScope, ...args: string[]) => number | Promise<number>;

// =============================================================================
// Contract directives
// =============================================================================

export type EnvOperation = 'set' | 'append' | 'prepend' | 'remove';

/** `contract:env:NAME=VALUE`, `NAME+=`, `NAME^=`, `NAME-=` */
export interface EnvDirective {
    kind: 'env';
    op: EnvOperation;
    name: string;
    value: string;
}

/** `contract:route:<module>` */
export interface RouteDirective {
    kind: 'route';
    target: string;
}

/** `contract:exit:<code>` */
export interface ExitDirective {
    kind: 'exit';
    code: number;
}

/** Any other `contract:<payload>`; meaning is up to the middleware */
export interface CustomDirective {
    kind: 'custom';
    payload: string;
}

export type ContractDirective = EnvDirective | RouteDirective | ExitDirective | CustomDirective;
