import { delimiter as PATH_DELIMITER } from 'path';
import type { HookEnv } from '../capture/types.js';
import type { EnvDirective } from './types.js';

/**
 * Apply an env directive to `env` in place. Only the named variable changes.
 *
 * List operations treat the value as `delimiter`-separated segments
 * (`:` on POSIX). Removing from an unset variable does nothing.
 *
 * @returns the variable's new value
 */
export function applyEnvDirective(
    env: HookEnv,
    directive: EnvDirective,
    delimiter: string = PATH_DELIMITER,
): string | undefined {
    const { name, value } = directive;
    const current = env[name];

    switch (directive.op) {
        case 'set':
            env[name] = value;
            break;
        case 'append':
            env[name] = current ? `${current}${delimiter}${value}` : value;
            break;
        case 'prepend':
            env[name] = current ? `${value}${delimiter}${current}` : value;
            break;
        case 'remove':
            if (current !== undefined) {
                env[name] = current
                    .split(delimiter)
                    .filter((segment) => segment !== value)
                    .join(delimiter);
            }
            break;
    }

    return env[name];
}
