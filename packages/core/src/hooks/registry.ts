/**
 * Hook Registry - Declarations, registrations, middleware bindings, patterns
 *
 * Pure bookkeeping; running hooks is the engine's job.
 */

import { minimatch } from 'minimatch';
import type { HookCallback } from '../capture/types.js';
import type { LoggerRegistry } from '../logger.js';
import type { Middleware } from '../middleware/types.js';
import { isValidHookName } from '../names.js';
import { DeclarationError, RegistrationError, type ExecMode } from '../types.js';
import type { HookDeclaration, HookRegisterOptions } from './types.js';

export class HookRegistry {
    private readonly declarations = new Map<string, HookDeclaration>();
    private readonly functions = new Map<string, HookCallback>();
    private readonly registrations = new Map<string, Map<string, HookCallback>>();
    private readonly middlewares = new Map<string, Middleware>();
    private sourcePatterns: string[] = [];
    private scriptPatterns: string[] = [];

    constructor(private readonly loggers: LoggerRegistry) {}

    // =========================================================================
    // Declarations
    // =========================================================================

    /**
     * Declare hooks on behalf of `context`. Names are checked before any is
     * declared, so an invalid name rejects the whole call.
     *
     * @throws {DeclarationError}
     */
    declare(context: string, names: string[]): void {
        if (names.length === 0) {
            throw new DeclarationError({ message: 'No hook names given', details: { context } });
        }
        const invalid = names.filter((name) => !isValidHookName(name));
        if (invalid.length > 0) {
            throw new DeclarationError({
                message: `Invalid hook name(s): ${invalid.map((name) => `"${name}"`).join(', ')}`,
                hook: invalid[0],
                details: { context, allowed: '[A-Za-z0-9_-]' },
            });
        }

        const log = this.loggers.get('hooks');
        for (const name of names) {
            const existing = this.declarations.get(name);
            if (!existing) {
                this.declarations.set(name, { name, contexts: [context] });
                log.echo(`declared ${name} (${context})`);
                continue;
            }
            if (existing.contexts.includes(context)) {
                log.echo(`${name} already declared by ${context}, skipping`);
                continue;
            }
            this.loggers.get('warn').echo(
                `hook ${name} already declared by ${existing.contexts.join(', ')}; also declared by ${context}`,
            );
            existing.contexts.push(context);
        }
    }

    isDeclared(hook: string): boolean {
        return this.declarations.has(hook);
    }

    declaration(hook: string): HookDeclaration | undefined {
        const found = this.declarations.get(hook);
        return found ? { name: found.name, contexts: [...found.contexts] } : undefined;
    }

    declaredHooks(): string[] {
        return [...this.declarations.keys()];
    }

    // =========================================================================
    // Inline function table
    // =========================================================================

    defineFunction(name: string, callback: HookCallback): void {
        if (typeof callback !== 'function') {
            throw new RegistrationError({ message: `Function ${name} needs a callback` });
        }
        this.functions.set(name, callback);
    }

    undefineFunction(name: string): boolean {
        return this.functions.delete(name);
    }

    lookupFunction(name: string): HookCallback | undefined {
        return this.functions.get(name);
    }

    // =========================================================================
    // Registered implementations
    // =========================================================================

    /**
     * @throws {RegistrationError} for missing arguments or a duplicate sort
     * key without `override`
     */
    register(hook: string, sortKey: string, callback: HookCallback, options: HookRegisterOptions = {}): void {
        if (!hook || !sortKey || typeof callback !== 'function') {
            throw new RegistrationError({
                message: 'register() needs a hook name, a sort key and a callback',
                hook: hook || undefined,
                details: { sortKey: sortKey || null },
            });
        }
        if (!isValidHookName(hook)) {
            throw new RegistrationError({ message: `Invalid hook name: "${hook}"`, hook });
        }

        let entries = this.registrations.get(hook);
        if (!entries) {
            entries = new Map();
            this.registrations.set(hook, entries);
        }
        if (entries.has(sortKey) && !options.override) {
            throw new RegistrationError({
                message: `"${sortKey}" is already registered for ${hook}`,
                hook,
                details: { sortKey, hint: 'pass { override: true } to replace it' },
            });
        }

        entries.set(sortKey, callback);
        if (!this.declarations.has(hook)) {
            this.loggers.get('hooks').echo(`registered ${sortKey} for undeclared hook ${hook}; it runs once ${hook} is declared`);
        }
    }

    /**
     * @throws {RegistrationError} when nothing is registered under the key
     */
    unregister(hook: string, sortKey: string): void {
        const entries = this.registrations.get(hook);
        if (!entries?.delete(sortKey)) {
            throw new RegistrationError({
                message: `"${sortKey}" is not registered for ${hook}`,
                hook,
                details: { sortKey },
            });
        }
        if (entries.size === 0) {
            this.registrations.delete(hook);
        }
    }

    /** Registered callbacks for a hook, keyed by sort key */
    registered(hook: string): Array<[string, HookCallback]> {
        return [...(this.registrations.get(hook) ?? new Map<string, HookCallback>())];
    }

    // =========================================================================
    // Middleware bindings
    // =========================================================================

    /** Bind a middleware, or go back to the default when none is given */
    useMiddleware(hook: string, middleware?: Middleware): void {
        if (middleware) {
            this.middlewares.set(hook, middleware);
        } else {
            this.middlewares.delete(hook);
        }
    }

    middleware(hook: string): Middleware | undefined {
        return this.middlewares.get(hook);
    }

    // =========================================================================
    // Exec-mode patterns
    // =========================================================================

    addSourcePatterns(patterns: string[]): void {
        this.sourcePatterns.push(...patterns);
    }

    addScriptPatterns(patterns: string[]): void {
        this.scriptPatterns.push(...patterns);
    }

    /**
     * Run mode for a script file: source patterns first, then script
     * patterns, then `fallback`.
     */
    execModeFor(fileName: string, fallback: ExecMode): ExecMode {
        if (this.sourcePatterns.some((pattern) => minimatch(fileName, pattern, { dot: true }))) {
            return 'source';
        }
        if (this.scriptPatterns.some((pattern) => minimatch(fileName, pattern, { dot: true }))) {
            return 'exec';
        }
        return fallback;
    }

    clear(): void {
        this.declarations.clear();
        this.functions.clear();
        this.registrations.clear();
        this.middlewares.clear();
        this.sourcePatterns = [];
        this.scriptPatterns = [];
    }
}
