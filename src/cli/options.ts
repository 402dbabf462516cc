import { z } from 'zod';
import { CliOptions, DEFAULTS, ENGINE_NAMES } from '../types/options.js';
import { createInvalidOptionError } from '../types/errors.js';

export const VERSION = '0.1.0';

export const HELP = `
dpll-sat v${VERSION}

Decide satisfiability of a DIMACS CNF formula.

Usage:
  dpll-sat [file]             Solve the formula in file (standard input if omitted or '-')

Options:
  --engine=<name>    Select solver engine (${ENGINE_NAMES.join(', ')}); default from $${DEFAULTS.engineEnvVar} or '${DEFAULTS.engine}'
  --stats            Print solver statistics to standard error
  --trace            Print the DPLL search trace to standard error
  --verify           Check the assignment against the formula before printing it
  --help, -h         Show this help
  --version, -v      Show version

Output:
  Satisfiable formulas print one line of signed 1-based literals, e.g. "1 -2 3".
  Unsatisfiable formulas print nothing and exit with status 1.
`;

const cliOptionsSchema = z.object({
    engine: z.enum(['dpll', 'minisat']),
    file: z.string().min(1).optional(),
    stats: z.boolean(),
    verify: z.boolean(),
    includeTrace: z.boolean(),
    help: z.boolean(),
    version: z.boolean(),
}).refine(o => !(o.includeTrace && o.engine !== 'dpll'), {
    message: '--trace is only supported by the dpll engine',
});

/**
 * Parse command-line arguments (without the node and script entries).
 * The engine comes from --engine, then the environment, then DEFAULTS.
 * @throws SatException with INVALID_OPTION
 */
export function parseArgs(
    args: readonly string[],
    env: Record<string, string | undefined> = {}
): CliOptions {
    let engine: string = env[DEFAULTS.engineEnvVar] || DEFAULTS.engine;
    const files: string[] = [];
    const flags = { stats: false, verify: false, includeTrace: false, help: false, version: false };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg.startsWith('--engine=')) {
            engine = arg.slice('--engine='.length);
        } else if (arg === '--engine') {
            if (i + 1 >= args.length) {
                throw createInvalidOptionError('--engine requires a value');
            }
            engine = args[++i];
        } else if (arg === '--stats') {
            flags.stats = true;
        } else if (arg === '--verify') {
            flags.verify = true;
        } else if (arg === '--trace') {
            flags.includeTrace = true;
        } else if (arg === '--help' || arg === '-h') {
            flags.help = true;
        } else if (arg === '--version' || arg === '-v') {
            flags.version = true;
        } else if (arg === '-' || !arg.startsWith('-')) {
            files.push(arg);
        } else {
            throw createInvalidOptionError(`Unknown option '${arg}'`, 'Run with --help for usage');
        }
    }

    if (files.length > 1) {
        throw createInvalidOptionError('Only one input file may be given');
    }

    const parsed = cliOptionsSchema.safeParse({
        engine,
        file: files[0] === '-' ? undefined : files[0],
        ...flags,
    });
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const message = issue.path[0] === 'engine'
            ? `Invalid engine '${engine}'. Valid options are: ${ENGINE_NAMES.join(', ')}`
            : issue.message;
        throw createInvalidOptionError(message);
    }
    return parsed.data;
}
