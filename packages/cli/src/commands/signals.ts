import chalk from 'chalk';
import type { SignalListing } from '@lifehooks/core';
import { exitWithError } from '../errors.js';
import { cliSignals, installSignalHandlers } from '../exit.js';

interface SignalsOptions {
    json?: boolean;
}

/**
 * Show what the CLI's signal registry has installed: handlers in
 * registration order (dispatch runs them last first) and the disposition
 * that was there before.
 */
export function signalsCommand(signals: string[], options: SignalsOptions): void {
    installSignalHandlers();

    let listings: SignalListing[];
    try {
        listings = cliSignals().list(signals.length > 0 ? signals : undefined);
    } catch (error) {
        exitWithError(error);
    }

    if (options.json) {
        console.log(JSON.stringify(listings, null, 2));
        return;
    }

    if (listings.length === 0) {
        console.log(chalk.yellow('No signals installed'));
        return;
    }
    for (const listing of listings) {
        console.log(chalk.bold(listing.signal));
        if (listing.legacy) {
            console.log(chalk.dim(`  previous: ${listing.legacy}`));
        }
        if (listing.handlers.length === 0) {
            console.log(chalk.dim('  (no handlers)'));
        }
        for (const handler of listing.handlers) {
            console.log(`  ${handler}`);
        }
    }
}
