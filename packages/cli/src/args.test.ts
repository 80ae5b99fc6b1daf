import { describe, it, expect } from 'vitest';
import { parseArgs } from './args.js';

const DEFAULTS = { foreground: false, verbose: false, help: false };

describe('parseArgs', () => {
    it('returns no command for empty argv', () => {
        expect(parseArgs([])).toEqual({ ok: true, args: { positionals: [], options: DEFAULTS } });
    });

    it('splits the command from its positionals', () => {
        expect(parseArgs(['ask', "What's", '25 plus 17?'])).toEqual({
            ok: true,
            args: { command: 'ask', positionals: ["What's", '25 plus 17?'], options: DEFAULTS },
        });
    });

    it('reads value options in both spellings', () => {
        const result = parseArgs(['ask', '--model', 'llama-3.1-8b-instant', '--port=7000', 'hi']);
        expect(result).toEqual({
            ok: true,
            args: {
                command: 'ask',
                positionals: ['hi'],
                options: { ...DEFAULTS, model: 'llama-3.1-8b-instant', port: 7000 },
            },
        });
    });

    it('reads short flags', () => {
        const result = parseArgs(['daemon', '-f', '-v']);
        expect(result.ok && result.args.options).toEqual({ ...DEFAULTS, foreground: true, verbose: true });
    });

    it('treats everything after -- as positional', () => {
        const result = parseArgs(['ask', '--', '--not-an-option']);
        expect(result.ok && result.args.positionals).toEqual(['--not-an-option']);
    });

    it('rejects unknown options', () => {
        expect(parseArgs(['ask', '--temperature', '1'])).toEqual({ ok: false, error: 'Unknown option: --temperature' });
    });

    it('rejects a missing value', () => {
        expect(parseArgs(['ask', '--model'])).toEqual({ ok: false, error: 'Option --model needs a value' });
    });

    it('rejects a bad port', () => {
        expect(parseArgs(['tools', '-p', '99999'])).toEqual({ ok: false, error: 'Invalid port: 99999' });
        expect(parseArgs(['tools', '--port=abc'])).toEqual({ ok: false, error: 'Invalid port: abc' });
    });

    it('rejects a value on a flag', () => {
        expect(parseArgs(['daemon', '--foreground=yes'])).toEqual({ ok: false, error: 'Option --foreground does not take a value' });
    });
});
