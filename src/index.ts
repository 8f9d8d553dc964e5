#!/usr/bin/env node
/**
 * sar-ingest CLI entry point
 *
 * Usage:
 *   sar-ingest <command> [options]
 *
 * SIGINT/SIGTERM abort the running command at its next suspension point.
 * Exit code 1 on configuration or authentication failure, 0 otherwise.
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './utils/logger.js';
import { isAbortError } from './utils/sleep.js';
import { AuthenticationError, ConfigError, toAppError } from './types/errors.js';
import { parseArgs, USAGE } from './cli/args.js';
import { executeCommand } from './cli/commands.js';

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
    const args = parseArgs(argv);

    if (args.command === null) {
        if (args.unknownCommand !== undefined) {
            console.error(`❌ Unknown command: ${args.unknownCommand}`);
        }
        console.error(USAGE);
        return 1;
    }

    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'Received shutdown signal, stopping');
        controller.abort();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    try {
        return await executeCommand(args.command, {
            args,
            env: process.env,
            signal: controller.signal,
            print: (line) => console.log(line),
        });
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`❌ Configuration error: ${error.message}`);
            for (const issue of error.issues) {
                console.error(`   ${issue}`);
            }
            return 1;
        }
        if (error instanceof AuthenticationError) {
            console.error(`❌ ASF authentication failed: ${error.message}`);
            return 1;
        }
        if (controller.signal.aborted && isAbortError(error)) {
            console.log('⏹️  Interrupted by user');
            return 0;
        }
        const appError = toAppError(error);
        logger.error({ err: error, code: appError.code, operational: appError.isOperational }, 'Command failed');
        console.error(`❌ Error: ${appError.message}`);
        return 1;
    } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
    }
}

function isMainModule(): boolean {
    const invoked = process.argv[1];
    if (!invoked) {
        return false;
    }
    try {
        // npm links the bin entry, so compare resolved paths
        return realpathSync(invoked) === fileURLToPath(import.meta.url);
    } catch {
        return false;
    }
}

// Run if called directly
if (isMainModule()) {
    main()
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            logger.fatal({ err: error }, 'Unhandled error');
            process.exitCode = 1;
        });
}
