/**
 * Default middleware - pure replay
 *
 * Hooks without a middleware binding behave exactly as if their output had
 * never been captured: every line goes to the stream it came from, in
 * buffer order, and the status passes through untouched.
 */

import type { CaptureBuffer } from '../capture/types.js';
import { ContractError, type OutputStreams } from '../types.js';
import { ARGUMENT_SEPARATOR, type Middleware } from './types.js';

/**
 * Strip the leading `--` from middleware arguments.
 *
 * @throws {ContractError} when the separator is missing
 */
export function takeImplementationArgs(args: string[]): string[] {
    if (args[0] !== ARGUMENT_SEPARATOR) {
        throw new ContractError({
            message: `Middleware arguments must start with "${ARGUMENT_SEPARATOR}"`,
            details: { received: args[0] ?? null },
        });
    }
    return args.slice(1);
}

/**
 * Write every captured line to its own stream.
 */
export function replayCapture(capture: CaptureBuffer, output: OutputStreams): void {
    for (const line of capture.lines) {
        output[line.stream].write(`${line.text}\n`);
    }
}

export const defaultMiddleware: Middleware = function defaultMiddleware(scope, ...args) {
    takeImplementationArgs(args);
    replayCapture(scope.capture, scope.output);
    return scope.exitCode;
};
