#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'module';
import { errorMessage } from '@lifehooks/core';
import { configCommand } from './commands/config.js';
import { listCommand } from './commands/list.js';
import { runCommand } from './commands/run.js';
import { signalsCommand } from './commands/signals.js';
import { ExitPendingError, requestExit } from './exit.js';
import { EXEC_MODES, enumArgParser } from './validation.js';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command();

program
    .name('lifehooks')
    .description('Run project hooks: inline functions, registered callbacks and hook scripts')
    .version(pkg.version)
    .enablePositionalOptions();

// Running
program
    .command('run <hook> [args...]')
    .description('Run every implementation of a hook and exit with its status')
    .option('-d, --dir <dir>', 'Hooks directory (default: ci-cd, or HOOKS_DIR)')
    .option('-m, --mode <mode>', 'Run mode for scripts no pattern matches (exec, source)', enumArgParser(EXEC_MODES, '--mode'))
    .option('-c, --contract', 'Interpret contract directives in the hook output')
    .option('-l, --lifecycle', 'Run begin first and end on exit')
    .passThroughOptions()
    .action(runCommand);

// Diagnostics
program
    .command('list [hooks...]')
    .alias('ls')
    .description('Show what would run for each hook, in run order')
    .addHelpText('after', `
Without hook names, every script's hook is taken to be the part of its file
name before the first - or _ (pre-deploy-notify.sh is listed under "pre").
Hook names listed under "contract" in config are matched whole first. Pass
hook names such as pre-deploy explicitly to list them.`)
    .option('-d, --dir <dir>', 'Hooks directory (default: ci-cd, or HOOKS_DIR)')
    .option('--json', 'Print the listing as JSON')
    .action(listCommand);

program
    .command('signals [signals...]')
    .description('Show the signal registry: handlers and previous dispositions')
    .option('--json', 'Print the listing as JSON')
    .action(signalsCommand);

// Configuration
program
    .command('config')
    .description('View or set configuration (supports dotted paths like hooks.execMode)')
    .argument('[key]', 'Config key or dotted path to get/set (e.g., patterns.source)')
    .argument('[value]', 'Value to set (comma-separated for lists)')
    .option('-w, --workspace', 'Target workspace config (.lifehooks/config.json)')
    .option('-u, --user', 'Target user config (~/.config/lifehooks/config.json)')
    .action(configCommand);

void program.parseAsync().catch((error: unknown) => {
    if (error instanceof ExitPendingError) return;
    console.error(chalk.red('Error:'), errorMessage(error));
    void requestExit(1);
});
