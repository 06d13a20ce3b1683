#!/usr/bin/env node
/**
 * Tournament Export - CLI entry point
 *
 * Downloads a community's tournaments for one calendar year and writes them to CSV.
 */
import { runExport } from './cli.js';
import { ConfigError } from './config/index.js';
import { CredentialError } from './auth/token.js';
import { logger } from './observability/logger.js';

process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
});

async function main(): Promise<void> {
    const summary = await runExport(process.argv.slice(2), process.env);
    if (summary) {
        console.log(`Exported ${summary.count} tournaments to ${summary.outputPath}`);
    }
}

main().catch((error: unknown) => {
    if (error instanceof ConfigError || error instanceof CredentialError) {
        console.error(`\n${error.message}\n`);
    } else {
        logger.error('Export failed', error);
        console.error(`Export failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exitCode = 1;
});
