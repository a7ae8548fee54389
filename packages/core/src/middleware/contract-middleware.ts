/**
 * Contract middleware - replay output and act on `contract:` directives
 *
 * Directives are only read from stdout; stderr is replayed as-is. Every
 * stdout line (directives included) is replayed too, so the default and
 * contract middleware print the same thing.
 *
 * A malformed or unhandled directive is logged on the error channel and
 * makes the implementation's status non-zero.
 */

import { errorMessage } from '../types.js';
import { parseDirective } from './contract.js';
import { takeImplementationArgs } from './default.js';
import { applyEnvDirective } from './env.js';
import type { ContractDirective, CustomDirective, Middleware, MiddlewareScope } from './types.js';

export interface ContractMiddlewareOptions {
    /**
     * Handle a custom directive. Return true when it was understood;
     * anything else counts as an unknown directive.
     */
    onDirective?: (directive: CustomDirective, scope: MiddlewareScope) => boolean | void;
}

export function createContractMiddleware(options: ContractMiddlewareOptions = {}): Middleware {
    return function contractMiddleware(scope: MiddlewareScope, ...args: string[]): number {
        takeImplementationArgs(args);

        const modes = scope.loggers.get('modes');
        const error = scope.loggers.get('error');
        let failed = false;

        const act = (directive: ContractDirective): boolean => {
            switch (directive.kind) {
                case 'env': {
                    const value = applyEnvDirective(scope.env, directive);
                    modes.echo(`${scope.hookName}: ${directive.op} ${directive.name} -> ${value ?? '(unset)'}`);
                    if (directive.name === 'DEBUG') {
                        scope.loggers.refresh(scope.env.DEBUG);
                    }
                    return true;
                }
                case 'route':
                    modes.echo(`${scope.hookName}: route to ${directive.target}`);
                    scope.flow.routeTo(directive.target);
                    return true;
                case 'exit':
                    modes.echo(`${scope.hookName}: exit ${directive.code}`);
                    scope.flow.exit(directive.code);
                    return true;
                case 'custom':
                    return options.onDirective?.(directive, scope) === true;
            }
        };

        for (const line of scope.capture.lines) {
            if (line.stream === 'stderr') {
                scope.output.stderr.write(`${line.text}\n`);
                continue;
            }
            scope.output.stdout.write(`${line.text}\n`);

            let directive: ContractDirective | null;
            try {
                directive = parseDirective(line.text);
            } catch (err) {
                error.echo(`${scope.hookName}: ${errorMessage(err)}`);
                failed = true;
                continue;
            }

            if (directive && !act(directive)) {
                error.echo(`${scope.hookName}: unknown directive: ${line.text}`);
                failed = true;
            }
        }

        if (failed && scope.exitCode === 0) {
            return 1;
        }
        return scope.exitCode;
    };
}

/** Contract middleware with no custom directives */
export const contractMiddleware: Middleware = createContractMiddleware();
