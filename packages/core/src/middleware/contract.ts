/**
 * Contract directives - typed messages carried as `contract:` output lines
 *
 * Isolated implementations (subprocesses, callbacks) cannot touch the
 * coordinator's state. Instead they print directives on stdout and a
 * contract-aware middleware acts on them:
 *
 *   contract:env:NAME=VALUE     set
 *   contract:env:NAME+=VALUE    append to a path-like list
 *   contract:env:NAME^=VALUE    prepend to a path-like list
 *   contract:env:NAME-=VALUE    remove every matching list segment
 *   contract:route:<module>     run <module> in-process and stop
 *   contract:exit:<code>        stop with <code>
 *
 * Anything else after `contract:` is a custom directive.
 */

import { isValidEnvName } from '../names.js';
import { ContractError } from '../types.js';
import type { ContractDirective, EnvDirective, EnvOperation } from './types.js';

export const CONTRACT_PREFIX = 'contract:';

const OPERATORS: Record<string, EnvOperation> = {
    '+': 'append',
    '^': 'prepend',
    '-': 'remove',
};

const SYMBOLS: Record<EnvOperation, string> = {
    set: '=',
    append: '+=',
    prepend: '^=',
    remove: '-=',
};

function parseEnv(body: string, line: string): EnvDirective {
    const eq = body.indexOf('=');
    if (eq === -1) {
        throw new ContractError({
            message: `Malformed env directive (expected NAME=VALUE): ${line}`,
            details: { line },
        });
    }

    let name = body.slice(0, eq);
    let op: EnvOperation = 'set';
    const marker = OPERATORS[name.slice(-1)];
    if (marker) {
        op = marker;
        name = name.slice(0, -1);
    }

    if (!isValidEnvName(name)) {
        throw new ContractError({
            message: `Invalid variable name in env directive: ${name || '(empty)'}`,
            details: { line },
        });
    }

    return { kind: 'env', op, name, value: body.slice(eq + 1) };
}

/**
 * Parse one output line.
 *
 * @returns null for ordinary output
 * @throws {ContractError} for malformed env, route or exit directives
 */
export function parseDirective(line: string): ContractDirective | null {
    if (!line.startsWith(CONTRACT_PREFIX)) {
        return null;
    }
    const body = line.slice(CONTRACT_PREFIX.length);

    if (body.startsWith('env:')) {
        return parseEnv(body.slice('env:'.length), line);
    }

    if (body.startsWith('route:')) {
        const target = body.slice('route:'.length).trim();
        if (!target) {
            throw new ContractError({ message: `Route directive without a target: ${line}`, details: { line } });
        }
        return { kind: 'route', target };
    }

    if (body.startsWith('exit:')) {
        const raw = body.slice('exit:'.length).trim();
        const code = Number(raw);
        if (!/^\d+$/.test(raw) || code > 255) {
            throw new ContractError({ message: `Invalid exit code in directive: ${line}`, details: { line } });
        }
        return { kind: 'exit', code };
    }

    return { kind: 'custom', payload: body };
}

/**
 * Render a directive as the line an implementation prints.
 *
 * @example
 * ```typescript
 * encodeDirective({ kind: 'env', op: 'append', name: 'PATH', value: '/opt/bin' })
 * // 'contract:env:PATH+=/opt/bin'
 * ```
 */
export function encodeDirective(directive: ContractDirective): string {
    switch (directive.kind) {
        case 'env':
            return `${CONTRACT_PREFIX}env:${directive.name}${SYMBOLS[directive.op]}${directive.value}`;
        case 'route':
            return `${CONTRACT_PREFIX}route:${directive.target}`;
        case 'exit':
            return `${CONTRACT_PREFIX}exit:${directive.code}`;
        case 'custom':
            return `${CONTRACT_PREFIX}${directive.payload}`;
    }
}
