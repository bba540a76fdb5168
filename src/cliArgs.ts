import { createConfigurationError } from './types/index.js';

export interface CliOptions {
    command?: string;
    engine: string;
    oracle?: string;
    /** Raw campaign parameters, validated later by the campaign schema */
    campaign: Record<string, unknown>;
    json: boolean;
    script: boolean;
    help: boolean;
    version: boolean;
}

const NUMERIC_FLAGS: Record<string, string> = {
    '--tests': 'numTests',
    '--constraints': 'constraintsPerTest',
    '--depth': 'maxDepth',
    '--bool-depth': 'booleanMaxDepth',
    '--seed': 'seed',
    '--timeout': 'timeoutMs',
};

const STRING_FLAGS = ['--engine', '--oracle', '--vars', '--range'];

const BOOLEAN_FLAGS: Record<string, 'json' | 'script' | 'help' | 'version'> = {
    '--json': 'json',
    '--script': 'script',
    '--help': 'help',
    '-h': 'help',
    '--version': 'version',
    '-v': 'version',
};

/**
 * Parse `process.argv.slice(2)`. Flags take `--name=value` or `--name value`.
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
    const options: CliOptions = {
        engine: 'z3',
        campaign: {},
        json: false,
        script: false,
        help: false,
        version: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (!arg.startsWith('-')) {
            if (options.command !== undefined) {
                throw createConfigurationError(`Unexpected argument '${arg}'`);
            }
            options.command = arg;
            continue;
        }

        const booleanFlag = BOOLEAN_FLAGS[arg];
        if (booleanFlag) {
            options[booleanFlag] = true;
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq >= 0 ? arg.slice(0, eq) : arg;
        if (!(name in NUMERIC_FLAGS) && !STRING_FLAGS.includes(name)) {
            throw createConfigurationError(`Unknown option '${arg}'`);
        }

        let value: string;
        if (eq >= 0) {
            value = arg.slice(eq + 1);
        } else if (i + 1 < args.length) {
            value = args[++i];
        } else {
            throw createConfigurationError(`Option '${name}' requires a value`);
        }

        applyValue(options, name, value);
    }

    return options;
}

function applyValue(options: CliOptions, name: string, value: string): void {
    const key = NUMERIC_FLAGS[name];
    if (key) {
        options.campaign[key] = Number(value);
        return;
    }

    switch (name) {
        case '--engine':
            options.engine = value;
            break;
        case '--oracle':
            options.oracle = value;
            break;
        case '--vars':
            options.campaign.variables = value.split(',').map(v => v.trim()).filter(v => v.length > 0);
            break;
        case '--range': {
            // min:max, e.g. --range=-10:10
            const [min, max] = value.split(':');
            options.campaign.intRange = { min: Number(min), max: Number(max) };
            break;
        }
    }
}
