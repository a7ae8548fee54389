import chalk from 'chalk';
import type { ExecMode, HookEngine } from '@lifehooks/core';
import { loadConfig } from '../config.js';
import { createCliEngine } from '../engine.js';
import { exitWithError } from '../errors.js';
import { exit, installSignalHandlers } from '../exit.js';

interface RunOptions {
    dir?: string;
    mode?: ExecMode;
    contract?: boolean;
    lifecycle?: boolean;
}

/**
 * Declare `hook`, run it and exit with its status. With --lifecycle, `begin`
 * runs first and `end` runs on the way out with the final status.
 */
export async function runCommand(hook: string, args: string[], options: RunOptions): Promise<void> {
    let engine: HookEngine;
    try {
        const config = loadConfig({
            flags: {
                hooksDir: options.dir,
                execMode: options.mode,
                autoTrap: options.lifecycle ? true : undefined,
            },
        });
        engine = createCliEngine(config, { contract: options.contract ? [hook] : [] });
        engine.declare(hook);
    } catch (error) {
        exitWithError(error);
    }

    installSignalHandlers();

    let begin = 0;
    let beginTerminated = false;
    let status: number;
    try {
        if (options.lifecycle) {
            engine.bootstrap();
            begin = await engine.do('begin', hook, ...args);
            // A route or contract:exit in begin ends the run whatever its code
            beginTerminated = engine.phase('begin') === 'terminated';
        }
        status = begin === 0 && !beginTerminated ? await engine.do(hook, ...args) : begin;
    } catch (error) {
        exitWithError(error);
    }

    if (beginTerminated) {
        console.error(chalk.yellow('begin hook terminated the run'), chalk.dim(`(status ${begin}, ${hook} not run)`));
    } else if (begin !== 0) {
        console.error(chalk.red('Error:'), `begin hook failed with status ${begin}, ${hook} not run`);
    }
    exit(status);
}
