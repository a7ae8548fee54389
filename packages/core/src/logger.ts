/**
 * Tag Logger - Diagnostic channels switched on and off by DEBUG
 *
 * Each tag is registered once and gets a small capability table (echo,
 * printf, sink) bound to its prefix and output. Whether a tag prints is
 * decided by the DEBUG variable:
 *
 * - `DEBUG=hooks,modes` enables the listed tags
 * - `DEBUG=*` enables every tag
 * - `DEBUG=*,-trap` enables every tag except trap
 *
 * Tags registered with `defaultEnabled` (error, warn) print unless they are
 * explicitly disabled with `-tag`.
 */

import { format } from 'util';
import chalk from 'chalk';
import type { TextSink } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Capability table for one tag
 */
export interface TagLogger {
    readonly tag: string;
    /** Whether output is currently emitted */
    readonly enabled: boolean;
    /** Print the parts joined by spaces, followed by a newline */
    echo(...parts: unknown[]): void;
    /** printf-style output (util.format), no newline added */
    printf(template: string, ...args: unknown[]): void;
    /** Sink that echoes every written line through this tag */
    sink(): TextSink;
}

export interface TagOptions {
    /** Text written before every line */
    prefix?: string;
    /** Enabled when DEBUG does not mention the tag (default: false) */
    defaultEnabled?: boolean;
    /** Where lines go (default: the registry sink) */
    sink?: TextSink;
}

export interface LoggerRegistryOptions {
    /** Initial DEBUG value */
    debug?: string;
    /** Default output for every tag (default: process.stderr) */
    sink?: TextSink;
}

interface TagState {
    enabled: boolean;
    defaultEnabled: boolean;
    logger: TagLogger;
}

// =============================================================================
// DEBUG parsing
// =============================================================================

/**
 * Resolve whether `tag` is enabled for a DEBUG value.
 */
export function isTagEnabled(debug: string | undefined, tag: string, defaultEnabled = false): boolean {
    const tokens = (debug ?? '')
        .split(',')
        .map((token) => token.trim())
        .filter((token) => token.length > 0);

    if (tokens.includes(`-${tag}`)) {
        return false;
    }
    if (tokens.includes(tag) || tokens.includes('*')) {
        return true;
    }
    return defaultEnabled;
}

// =============================================================================
// Registry
// =============================================================================

export class LoggerRegistry {
    private readonly tags = new Map<string, TagState>();
    private readonly defaultSink: TextSink;
    private debug: string | undefined;

    constructor(options: LoggerRegistryOptions = {}) {
        this.debug = options.debug;
        this.defaultSink = options.sink ?? process.stderr;
    }

    /**
     * Register a tag (or return the existing one unchanged).
     */
    register(tag: string, options: TagOptions = {}): TagLogger {
        const existing = this.tags.get(tag);
        if (existing) {
            return existing.logger;
        }

        const prefix = options.prefix ?? `[${tag}] `;
        const sink = options.sink ?? this.defaultSink;
        const defaultEnabled = options.defaultEnabled ?? false;

        const state: TagState = {
            enabled: isTagEnabled(this.debug, tag, defaultEnabled),
            defaultEnabled,
            logger: {
                tag,
                get enabled() {
                    return state.enabled;
                },
                echo(...parts: unknown[]) {
                    if (!state.enabled) return;
                    sink.write(`${prefix}${parts.map(String).join(' ')}\n`);
                },
                printf(template: string, ...args: unknown[]) {
                    if (!state.enabled) return;
                    sink.write(`${prefix}${format(template, ...args)}`);
                },
                sink() {
                    let pending = '';
                    return {
                        write(chunk: string) {
                            pending += chunk;
                            let newline = pending.indexOf('\n');
                            while (newline !== -1) {
                                state.logger.echo(pending.slice(0, newline));
                                pending = pending.slice(newline + 1);
                                newline = pending.indexOf('\n');
                            }
                            return true;
                        },
                    };
                },
            },
        };

        this.tags.set(tag, state);
        return state.logger;
    }

    /**
     * Look up a tag, registering it with defaults when unknown.
     */
    get(tag: string): TagLogger {
        return this.tags.get(tag)?.logger ?? this.register(tag);
    }

    isEnabled(tag: string): boolean {
        return this.tags.get(tag)?.enabled ?? isTagEnabled(this.debug, tag);
    }

    /**
     * Re-evaluate every tag against a new DEBUG value.
     */
    refresh(debug: string | undefined): void {
        this.debug = debug;
        for (const [tag, state] of this.tags) {
            state.enabled = isTagEnabled(debug, tag, state.defaultEnabled);
        }
    }

    registeredTags(): string[] {
        return [...this.tags.keys()];
    }
}

/**
 * Registry pre-populated with the engine's channels.
 */
export function createLoggers(options: LoggerRegistryOptions = {}): LoggerRegistry {
    const registry = new LoggerRegistry({ debug: process.env.DEBUG, ...options });

    registry.register('hooks', { prefix: `${chalk.gray('[hooks]')} ` });
    registry.register('modes', { prefix: `${chalk.yellow('[modes]')} ` });
    registry.register('trap', { prefix: `[${chalk.blue('trap')}] ` });
    registry.register('warn', { prefix: `${chalk.yellow('[warn]')} `, defaultEnabled: true });
    registry.register('error', { prefix: `${chalk.red('[error]')} `, defaultEnabled: true });

    return registry;
}
