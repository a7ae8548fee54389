/**
 * Hook Engine - Declares, collects and runs hook implementations
 *
 * One engine is the whole context of a coordinator: declarations,
 * registrations, middleware bindings, capture sequence and signal wiring
 * live on the instance, and reset() puts it back to a clean state.
 *
 * Run order for do(hook):
 *   1. the inline function `${functionPrefix}${hook}`, if defined
 *   2. registered callbacks and scripts, merged into one sequence by sort key
 *
 * Each implementation in exec mode is captured and passed through the
 * hook's middleware; in source mode it runs against the live environment and
 * real output streams. A middleware that routes or forces an exit ends the
 * run: remaining implementations are skipped and the engine's exit is called.
 */

import * as path from 'path';
import { pathToFileURL } from 'url';
import { CaptureHarness } from '../capture/harness.js';
import type { CaptureResult, HookCallback, HookEnv, Invocable } from '../capture/types.js';
import { configFromEnv, resolveEngineConfig, type EngineConfig, type EngineConfigInput } from '../config.js';
import { createLoggers, type LoggerRegistry } from '../logger.js';
import { defaultMiddleware } from '../middleware/default.js';
import { FlowControl } from '../middleware/flow.js';
import { ARGUMENT_SEPARATOR, type Middleware } from '../middleware/types.js';
import { EXIT_SIGNAL } from '../signals/host.js';
import { SignalRegistry } from '../signals/registry.js';
import { CaptureError, errorMessage, type ExecMode, type OutputStreams } from '../types.js';
import { discoverScripts } from './discovery.js';
import { HookRegistry } from './registry.js';
import type {
    HookListing,
    HookPhase,
    ImplementationListing,
    ImplementationPlan,
    InlineImplementation,
    MergedImplementation,
    HookRegisterOptions,
    SourceModule,
} from './types.js';

// =============================================================================
// Options
// =============================================================================

export interface HookEngineOptions {
    /** Coordinator environment; mutated by contract directives (default: process.env) */
    env?: HookEnv;
    /** Real output streams (default: process.stdout / process.stderr) */
    output?: OutputStreams;
    loggers?: LoggerRegistry;
    signals?: SignalRegistry;
    /** Overrides applied over defaults and HOOKS_* variables */
    config?: EngineConfigInput;
    /** Called when a run terminates (default: process.exit) */
    exit?: (code: number) => void;
    /** Loads source-mode and routed modules (default: dynamic import) */
    loadModule?: (file: string) => Promise<unknown>;
    /** Relay INT/TERM to exec-mode subprocesses while they run */
    forwardSignals?: boolean;
    /** Context name used by declare() */
    context?: string;
    /** File extensions a source-mode script may have (default: .js, .mjs, .cjs) */
    sourceExtensions?: string[];
}

const END_HOOKS = ['begin', 'end'];

const SOURCE_EXTENSIONS = ['.js', '.mjs', '.cjs'];

function importModule(file: string): Promise<unknown> {
    return import(pathToFileURL(file).href);
}

function isSourceModule(value: unknown): value is SourceModule {
    return typeof value === 'object'
        && value !== null
        && 'run' in value
        && typeof value.run === 'function';
}

function compareKeys(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function labelOf(implementation: MergedImplementation): string {
    return implementation.kind === 'script' ? implementation.fileName : implementation.sortKey;
}

/**
 * Registered and script implementations in one sequence: by sort key,
 * registered before script on equal keys, then by label.
 */
export function mergeImplementations(implementations: MergedImplementation[]): MergedImplementation[] {
    return [...implementations].sort((a, b) =>
        compareKeys(a.sortKey, b.sortKey)
        || (a.kind === b.kind ? 0 : a.kind === 'registered' ? -1 : 1)
        || compareKeys(labelOf(a), labelOf(b)));
}

// =============================================================================
// Engine
// =============================================================================

export class HookEngine {
    private readonly env: HookEnv;
    private readonly output: OutputStreams;
    private readonly loggers: LoggerRegistry;
    private readonly signals: SignalRegistry;
    private readonly harness: CaptureHarness;
    private readonly registry: HookRegistry;
    private readonly exitProcess: (code: number) => void;
    private readonly loadModule: (file: string) => Promise<unknown>;
    private readonly overrides?: EngineConfigInput;
    private readonly context: string;
    private readonly sourceExtensions: string[];
    private currentConfig: EngineConfig;
    private endTrapInstalled = false;
    private readonly phases = new Map<string, HookPhase>();

    constructor(options: HookEngineOptions = {}) {
        this.env = options.env ?? process.env;
        this.output = options.output ?? { stdout: process.stdout, stderr: process.stderr };
        this.loggers = options.loggers ?? createLoggers({ debug: this.env.DEBUG });
        this.signals = options.signals ?? new SignalRegistry({ loggers: this.loggers });
        this.harness = new CaptureHarness({
            loggers: this.loggers,
            signals: options.forwardSignals ? this.signals : undefined,
        });
        this.registry = new HookRegistry(this.loggers);
        this.exitProcess = options.exit ?? ((code: number) => process.exit(code));
        this.loadModule = options.loadModule ?? importModule;
        this.overrides = options.config;
        this.context = options.context ?? 'main';
        this.sourceExtensions = options.sourceExtensions ?? SOURCE_EXTENSIONS;
        this.currentConfig = this.loadConfig();
    }

    get config(): Readonly<EngineConfig> {
        return this.currentConfig;
    }

    /** Phase of the most recent do() call for a hook */
    phase(hook: string): HookPhase | undefined {
        return this.phases.get(hook);
    }

    // =========================================================================
    // Declarations and registrations
    // =========================================================================

    declare(...names: string[]): void {
        this.registry.declare(this.context, names);
    }

    declareFrom(context: string, ...names: string[]): void {
        this.registry.declare(context, names);
    }

    /**
     * Add to the inline function table. `hook:deploy` (with the default
     * prefix) is the inline implementation of `deploy`.
     */
    defineFunction(name: string, callback: HookCallback): void {
        this.registry.defineFunction(name, callback);
    }

    undefineFunction(name: string): boolean {
        return this.registry.undefineFunction(name);
    }

    register(hook: string, sortKey: string, callback: HookCallback, options: HookRegisterOptions = {}): void {
        this.registry.register(hook, sortKey, callback, options);
    }

    unregister(hook: string, sortKey: string): void {
        this.registry.unregister(hook, sortKey);
    }

    useMiddleware(hook: string, middleware?: Middleware): void {
        this.registry.useMiddleware(hook, middleware);
    }

    /** Scripts whose file name matches run in source mode */
    patternSource(...patterns: string[]): void {
        this.registry.addSourcePatterns(patterns);
    }

    /** Scripts whose file name matches run in exec mode */
    patternScript(...patterns: string[]): void {
        this.registry.addScriptPatterns(patterns);
    }

    execModeFor(fileName: string, fallback: ExecMode = this.currentConfig.execMode): ExecMode {
        return this.registry.execModeFor(fileName, fallback);
    }

    // =========================================================================
    // Queries
    // =========================================================================

    known(hook: string): boolean {
        return this.registry.isDeclared(hook);
    }

    /** Declared and has at least one implementation */
    runnable(hook: string): boolean {
        if (!this.known(hook)) return false;
        const plan = this.implementations(hook);
        return plan.inline !== undefined || plan.merged.length > 0;
    }

    /**
     * What do(hook) would run, in order. Exec-mode scripts must be
     * executable; source-mode scripts readable and named like a module.
     */
    implementations(hook: string, fallback: ExecMode = this.currentConfig.execMode): ImplementationPlan {
        const functionName = `${this.currentConfig.functionPrefix}${hook}`;
        const inlineCallback = this.registry.lookupFunction(functionName);
        const inline: InlineImplementation | undefined = inlineCallback
            ? { kind: 'inline', hook, functionName, callback: inlineCallback }
            : undefined;

        const collected: MergedImplementation[] = this.registry
            .registered(hook)
            .map(([sortKey, callback]): MergedImplementation => ({ kind: 'registered', hook, sortKey, callback }));

        const log = this.loggers.get('hooks');
        for (const script of discoverScripts(path.resolve(this.currentConfig.hooksDir), hook)) {
            const mode = this.registry.execModeFor(script.fileName, fallback);
            const usable = mode === 'exec' ? script.executable : script.readable;
            if (!usable) {
                log.echo(`skipping ${script.fileName}: not ${mode === 'exec' ? 'executable' : 'readable'}`);
                continue;
            }
            if (mode === 'source' && !this.sourceExtensions.includes(path.extname(script.fileName))) {
                log.echo(`skipping ${script.fileName}: not a module`);
                continue;
            }
            collected.push({
                kind: 'script',
                hook,
                sortKey: script.sortKey,
                path: script.path,
                fileName: script.fileName,
                mode,
            });
        }

        return { inline, merged: mergeImplementations(collected) };
    }

    list(): HookListing[] {
        return this.registry.declaredHooks().map((name) => {
            const plan = this.implementations(name);
            const fallback = this.currentConfig.execMode;
            const implementations: ImplementationListing[] = [];
            if (plan.inline) {
                implementations.push({ kind: 'inline', label: plan.inline.functionName, mode: fallback });
            }
            for (const implementation of plan.merged) {
                implementations.push({
                    kind: implementation.kind,
                    label: labelOf(implementation),
                    mode: implementation.kind === 'script' ? implementation.mode : fallback,
                });
            }
            const middleware = this.registry.middleware(name);
            return {
                name,
                contexts: this.registry.declaration(name)?.contexts ?? [],
                middleware: middleware ? middleware.name || 'custom' : 'default',
                implementations,
            };
        });
    }

    // =========================================================================
    // Running
    // =========================================================================

    /** Run every implementation of a hook in the configured mode */
    do(hook: string, ...args: string[]): Promise<number> {
        return this.execute(hook, args, this.currentConfig.execMode);
    }

    /** Run with source as the fallback mode for this call */
    doSource(hook: string, ...args: string[]): Promise<number> {
        return this.execute(hook, args, 'source');
    }

    /** Run with exec as the fallback mode for this call */
    doScript(hook: string, ...args: string[]): Promise<number> {
        return this.execute(hook, args, 'exec');
    }

    private async execute(hook: string, args: string[], fallback: ExecMode): Promise<number> {
        const log = this.loggers.get('hooks');

        if (!this.registry.isDeclared(hook)) {
            log.echo(`hook ${hook} is not declared, nothing to do`);
            return 0;
        }

        const plan = this.implementations(hook, fallback);
        if (!plan.inline && plan.merged.length === 0) {
            log.echo(`no implementations found for hook ${hook}`);
            this.phases.set(hook, 'done');
            return 0;
        }

        const flow = new FlowControl();
        let status = 0;
        this.phases.set(hook, 'pending');

        if (plan.inline) {
            this.phases.set(hook, 'inline');
            log.echo(`${hook}: ${plan.inline.functionName}`);
            status = await this.runCallback(hook, plan.inline.callback, args, fallback, flow);
            if (flow.terminate) {
                return this.terminate(hook, args, flow, status);
            }
        }

        this.phases.set(hook, 'merged');
        for (const implementation of plan.merged) {
            log.echo(`${hook}: ${labelOf(implementation)} (${implementation.kind})`);

            if (implementation.kind === 'registered') {
                status = await this.runCallback(hook, implementation.callback, args, fallback, flow);
            } else if (implementation.mode === 'source') {
                status = await this.runSource(hook, implementation.path, args);
            } else {
                status = await this.runCaptured(hook, {
                    kind: 'process',
                    command: implementation.path,
                    env: { ...this.env },
                }, args, flow);
            }

            if (flow.terminate) {
                return this.terminate(hook, args, flow, status);
            }
        }

        this.phases.set(hook, 'done');
        log.echo(`${hook}: done, status ${status}`);
        return status;
    }

    private runCallback(
        hook: string,
        callback: HookCallback,
        args: string[],
        mode: ExecMode,
        flow: FlowControl,
    ): Promise<number> {
        if (mode === 'source') {
            return this.runLive(hook, callback, args);
        }
        return this.runCaptured(hook, { kind: 'callback', callback, env: this.env }, args, flow);
    }

    private async runCaptured(hook: string, invocable: Invocable, args: string[], flow: FlowControl): Promise<number> {
        const { buffer, exitCode }: CaptureResult = await this.harness.run(hook, invocable, args);
        const middleware = this.registry.middleware(hook) ?? defaultMiddleware;
        return middleware(
            {
                hookName: hook,
                exitCode,
                capture: buffer,
                env: this.env,
                flow,
                output: this.output,
                loggers: this.loggers,
            },
            ARGUMENT_SEPARATOR,
            ...args,
        );
    }

    /**
     * Callback with the live environment and real streams: no capture, no
     * middleware. A thrown error is status 1 with its message on stderr.
     */
    private async runLive(hook: string, callback: HookCallback, args: string[]): Promise<number> {
        try {
            const result = await callback({
                hook,
                args: [...args],
                env: this.env,
                stdout: this.output.stdout,
                stderr: this.output.stderr,
            });
            return typeof result === 'number' ? result : 0;
        } catch (err) {
            this.output.stderr.write(`${errorMessage(err)}\n`);
            return 1;
        }
    }

    /**
     * Load a module in-process and call its `run` export.
     * A module without `run` is logged and counts as success.
     *
     * @throws {CaptureError} when the module cannot be loaded
     */
    private async runSource(hook: string, file: string, args: string[]): Promise<number> {
        let loaded: unknown;
        try {
            loaded = await this.loadModule(file);
        } catch (err) {
            throw new CaptureError({
                message: `Failed to load ${file}: ${errorMessage(err)}`,
                hook,
                details: { module: file },
                cause: err,
            });
        }
        if (!isSourceModule(loaded)) {
            this.loggers.get('error').echo(`${file} has no run() export, skipping`);
            return 0;
        }
        const source = loaded;
        return this.runLive(hook, (context) => source.run(context), args);
    }

    private async terminate(hook: string, args: string[], flow: FlowControl, status: number): Promise<number> {
        this.phases.set(hook, 'terminated');

        let code = flow.exitCode ?? status;
        if (flow.route) {
            const target = path.resolve(flow.route);
            this.loggers.get('modes').echo(`${hook}: routing to ${target}`);
            const routed = await this.runSource(hook, target, args);
            code = flow.exitCode ?? routed;
        }

        this.loggers.get('modes').echo(`${hook}: terminating with ${code}`);
        this.exitProcess(code);
        return code;
    }

    // =========================================================================
    // Lifecycle
    // =========================================================================

    /**
     * Declare begin/end and, when autoTrap is on, run `end` on EXIT with the
     * process exit code as its first argument.
     */
    bootstrap(): void {
        this.declareFrom('bootstrap', ...END_HOOKS);
        if (this.currentConfig.autoTrap && !this.endTrapInstalled) {
            this.signals.register(EXIT_SIGNAL, this.runEndHook);
            this.endTrapInstalled = true;
        }
    }

    private readonly runEndHook = async (): Promise<void> => {
        await this.do('end', String(this.signals.exitCode()));
    };

    /**
     * Forget every declaration, registration, binding and pattern; restart
     * buffer numbering; re-read configuration.
     */
    reset(): void {
        this.registry.clear();
        this.harness.reset();
        this.phases.clear();
        if (this.endTrapInstalled) {
            this.signals.unregister(EXIT_SIGNAL, this.runEndHook);
            this.endTrapInstalled = false;
        }
        this.currentConfig = this.loadConfig();
    }

    private loadConfig(): EngineConfig {
        return resolveEngineConfig(configFromEnv(this.env), this.overrides);
    }
}
