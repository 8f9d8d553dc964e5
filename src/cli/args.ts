/**
 * Command-line argument parsing
 *
 * Accepts `<command> [--flag value | --flag=value | --switch]...`.
 */

import { ConfigError } from '../types/errors.js';

export const COMMANDS = [
    'run',
    'schedule',
    'download',
    'check-auth',
    'validate-config',
    'init-config',
    'check-env',
] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface ParsedArgs {
    command: CommandName | null;
    /** The first argument as typed, when it is not a known command */
    unknownCommand?: string;
    options: Record<string, string | true>;
    positionals: string[];
}

function isCommandName(value: string): value is CommandName {
    return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
    const options: Record<string, string | true> = {};
    const positionals: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            positionals.push(arg);
            continue;
        }

        const body = arg.slice(2);
        const eq = body.indexOf('=');
        if (eq >= 0) {
            options[body.slice(0, eq)] = body.slice(eq + 1);
            continue;
        }

        const next = argv[i + 1];
        if (next !== undefined && !next.startsWith('--')) {
            options[body] = next;
            i++;
        } else {
            options[body] = true;
        }
    }

    const first = positionals.shift();
    if (first === undefined) {
        return { command: null, options, positionals };
    }
    if (isCommandName(first)) {
        return { command: first, options, positionals };
    }
    return { command: null, unknownCommand: first, options, positionals };
}

export function readStringOption(args: ParsedArgs, name: string): string | undefined {
    const value = args.options[name];
    if (value === true) {
        throw new ConfigError(`--${name} requires a value`);
    }
    return value;
}

/**
 * Read a numeric option, falling back when it is absent
 * @throws {ConfigError} If the value is not a number within bounds
 */
export function readNumberOption(
    args: ParsedArgs,
    name: string,
    fallback: number,
    constraints: { integer?: boolean; min?: number } = {}
): number {
    const raw = readStringOption(args, name);
    if (raw === undefined) {
        return fallback;
    }

    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new ConfigError(`--${name} must be a number, got "${raw}"`);
    }
    if (constraints.integer && !Number.isInteger(value)) {
        throw new ConfigError(`--${name} must be an integer, got "${raw}"`);
    }
    if (constraints.min !== undefined && value < constraints.min) {
        throw new ConfigError(`--${name} must be >= ${constraints.min}, got "${raw}"`);
    }
    return value;
}

export const USAGE = `Usage: sar-ingest <command> [options]

Commands:
  run [--days-back N] [--config PATH]                       Run the pipeline once (default days back: 7)
  schedule [--interval HOURS] [--config PATH]               Run the pipeline every HOURS hours (default: 24)
  download [--metadata-dir DIR] [--max-scenes N] [--config PATH]
                                                            Download scenes from stored metadata (default: 1 scene)
  check-auth                                                Check ASF authentication only
  validate-config [--config PATH]                           Validate the configuration file
  init-config [--config PATH]                               Write a default configuration file
  check-env                                                 Report which credentials are set
`;
