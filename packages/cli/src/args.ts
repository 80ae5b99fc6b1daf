/**
 * @parley/cli — Argument parsing
 *
 * Splits argv into a command, positionals and the handful of options
 * the commands understand. Pure; the router decides what to do with
 * the result.
 */

export interface CliOptions {
    model?: string;
    host?: string;
    port?: number;
    foreground: boolean;
    verbose: boolean;
    help: boolean;
}

export interface ParsedArgs {
    command?: string;
    positionals: string[];
    options: CliOptions;
}

export type ParseArgsResult = { ok: true; args: ParsedArgs } | { ok: false; error: string };

type ValueOption = 'model' | 'host' | 'port';
type FlagOption = 'foreground' | 'verbose' | 'help';

const VALUE_OPTIONS: Record<string, ValueOption> = {
    '--model': 'model',
    '-m': 'model',
    '--host': 'host',
    '--port': 'port',
    '-p': 'port',
};

const FLAG_OPTIONS: Record<string, FlagOption> = {
    '--foreground': 'foreground',
    '-f': 'foreground',
    '--verbose': 'verbose',
    '-v': 'verbose',
    '--help': 'help',
    '-h': 'help',
};

function parsePort(raw: string): number | undefined {
    if (!/^\d+$/.test(raw)) return undefined;
    const port = Number(raw);
    return port > 0 && port < 65_536 ? port : undefined;
}

export function parseArgs(argv: readonly string[]): ParseArgsResult {
    const options: CliOptions = { foreground: false, verbose: false, help: false };
    const words: string[] = [];
    let optionsEnded = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i] ?? '';

        if (optionsEnded || !arg.startsWith('-') || arg === '-') {
            words.push(arg);
            continue;
        }
        if (arg === '--') {
            optionsEnded = true;
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq > 0 ? arg.slice(0, eq) : arg;

        const flag = FLAG_OPTIONS[name];
        if (flag) {
            if (eq > 0) return { ok: false, error: `Option ${name} does not take a value` };
            options[flag] = true;
            continue;
        }

        const key = VALUE_OPTIONS[name];
        if (!key) return { ok: false, error: `Unknown option: ${name}` };

        let value: string | undefined;
        if (eq > 0) {
            value = arg.slice(eq + 1);
        } else {
            value = argv[i + 1];
            i++;
        }
        if (value === undefined || value === '') return { ok: false, error: `Option ${name} needs a value` };

        if (key === 'port') {
            const port = parsePort(value);
            if (port === undefined) return { ok: false, error: `Invalid port: ${value}` };
            options.port = port;
        } else {
            options[key] = value;
        }
    }

    const [command, ...positionals] = words;
    return { ok: true, args: { ...(command !== undefined ? { command } : {}), positionals, options } };
}
