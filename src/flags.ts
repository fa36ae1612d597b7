/**
 * Flag parsing for the lookup CLI. Accepts `--flag=value` and `--flag value`; in the second
 * form the next argument is consumed only when it does not start with "--".
 */
import { LookupRequestInput } from './domain/schemas';

export function getFlag(name: string, argv: string[]): string | undefined {
    for (let i = 0; i < argv.length; i++) {
        if (argv[i].startsWith(`--${name}=`)) return argv[i].slice(`--${name}=`.length);
        if (argv[i] === `--${name}`) {
            if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) return argv[i + 1];
            return ''; // boolean flag
        }
    }
    return undefined;
}

export function hasFlag(name: string, argv: string[]): boolean {
    return argv.some(arg => arg === `--${name}` || arg.startsWith(`--${name}=`));
}

const VALUE_FLAGS = new Set(['timeout', 'token', 'out-dir']);

/** First argument that is neither a flag nor the value of a flag that takes one. */
export function getPositional(argv: string[]): string | undefined {
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg.startsWith('--')) {
            if (VALUE_FLAGS.has(arg.slice(2)) && i + 1 < argv.length && !argv[i + 1].startsWith('--')) i++;
            continue;
        }
        return arg;
    }
    return undefined;
}

export interface CliOptions {
    request: LookupRequestInput;
    writeCsv: boolean;
    outDir: string;
    help: boolean;
}

export function parseCliArgs(argv: string[], cwd: string): CliOptions {
    const timeoutFlag = getFlag('timeout', argv);
    const tokenFlag = getFlag('token', argv);
    return {
        request: {
            identifier: getPositional(argv) ?? '',
            expandOrder: !hasFlag('no-expand', argv),
            // NaN on garbage; schema validation rejects it
            ...(timeoutFlag !== undefined ? { timeoutSeconds: Number(timeoutFlag) } : {}),
            ...(tokenFlag ? { authToken: tokenFlag } : {}),
        },
        writeCsv: hasFlag('csv', argv),
        outDir: getFlag('out-dir', argv) || cwd,
        help: hasFlag('help', argv) || argv.includes('-h'),
    };
}
