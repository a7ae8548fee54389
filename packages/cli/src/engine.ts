/**
 * Engine wiring shared by the commands: one engine per invocation, on the
 * CLI's signal registry and loggers, with patterns and contract bindings
 * taken from config.
 */

import { HookEngine, contractMiddleware } from '@lifehooks/core';
import type { ResolvedConfig } from './config.js';
import { cliLoggers, cliSignals } from './exit.js';

export interface CliEngineOptions {
    /** Extra hooks bound to the contract middleware */
    contract?: string[];
}

export function createCliEngine(config: ResolvedConfig, options: CliEngineOptions = {}): HookEngine {
    const loggers = cliLoggers();
    const engine = new HookEngine({
        loggers,
        signals: cliSignals(),
        config: config.engine,
        forwardSignals: true,
        context: 'cli',
        // do() returns the same status and phase() reports the termination;
        // the command decides when to exit
        exit: (code) => {
            loggers.get('modes').echo(`run terminated with status ${code}`);
        },
    });

    if (config.sourcePatterns.length > 0) {
        engine.patternSource(...config.sourcePatterns);
    }
    if (config.scriptPatterns.length > 0) {
        engine.patternScript(...config.scriptPatterns);
    }
    for (const hook of [...config.contract, ...(options.contract ?? [])]) {
        engine.useMiddleware(hook, contractMiddleware);
    }

    return engine;
}
