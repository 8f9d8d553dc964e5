import { describe, expect, it } from 'vitest';
import { parseArgs, readNumberOption, readStringOption } from '../../../src/cli/args.js';
import { ConfigError } from '../../../src/types/errors.js';

describe('parseArgs', () => {
    it('reads the command and both option spellings', () => {
        const args = parseArgs(['run', '--days-back', '10', '--config=custom.json']);

        expect(args).toEqual({
            command: 'run',
            options: { 'days-back': '10', config: 'custom.json' },
            positionals: [],
        });
    });

    it('treats an option followed by another option as a switch', () => {
        const args = parseArgs(['check-env', '--verbose', '--config', 'a.json']);

        expect(args.options).toEqual({ verbose: true, config: 'a.json' });
    });

    it('keeps an unrecognised command for the error message', () => {
        const args = parseArgs(['frobnicate', 'extra']);

        expect(args.command).toBeNull();
        expect(args.unknownCommand).toBe('frobnicate');
        expect(args.positionals).toEqual(['extra']);
    });

    it('returns no command for empty input', () => {
        expect(parseArgs([])).toEqual({ command: null, options: {}, positionals: [] });
    });
});

describe('readStringOption', () => {
    it('rejects a switch where a value is required', () => {
        const args = parseArgs(['run', '--config']);

        expect(() => readStringOption(args, 'config')).toThrow('--config requires a value');
    });
});

describe('readNumberOption', () => {
    it('falls back when the option is absent', () => {
        expect(readNumberOption(parseArgs(['run']), 'days-back', 7)).toBe(7);
    });

    it('parses a valid value', () => {
        expect(readNumberOption(parseArgs(['schedule', '--interval', '0.5']), 'interval', 24, { min: 0 })).toBe(0.5);
    });

    it('rejects values that are not numbers', () => {
        const args = parseArgs(['run', '--days-back', 'soon']);

        expect(() => readNumberOption(args, 'days-back', 7)).toThrow(ConfigError);
        expect(() => readNumberOption(args, 'days-back', 7)).toThrow('--days-back must be a number, got "soon"');
    });

    it('enforces integer and minimum constraints', () => {
        expect(() =>
            readNumberOption(parseArgs(['run', '--days-back=1.5']), 'days-back', 7, { integer: true })
        ).toThrow('--days-back must be an integer, got "1.5"');
        expect(() =>
            readNumberOption(parseArgs(['download', '--max-scenes=0']), 'max-scenes', 1, { integer: true, min: 1 })
        ).toThrow('--max-scenes must be >= 1, got "0"');
    });
});
