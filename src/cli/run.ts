import { readFileSync } from 'fs';
import chalk from 'chalk';
import { parseArgs, HELP, VERSION } from './options.js';
import { parseDimacs } from '../dimacs/parser.js';
import { formatAssignment } from '../dimacs/format.js';
import { satisfies } from '../logic/clause.js';
import { EngineRegistry } from '../engines/registry.js';
import { SatResult } from '../engines/interface.js';
import {
    SatException,
    createEngineError,
    createIOError,
    formatSatError,
} from '../types/errors.js';

export interface CliIO {
    /** Read the input file, or standard input when file is undefined */
    readInput(file: string | undefined): string;
    stdout(line: string): void;
    stderr(line: string): void;
    env: Record<string, string | undefined>;
    /** Colour stderr output; chalk's own detection decides when omitted */
    color?: boolean;
}

export function createProcessIO(): CliIO {
    return {
        readInput: file => readFileSync(file ?? 0, 'utf-8'),
        stdout: line => console.log(line),
        stderr: line => console.error(line),
        env: process.env,
    };
}

/**
 * Run the solver CLI and return the process exit status:
 * 0 when satisfiable (or for --help/--version), 1 otherwise.
 */
export async function runCli(args: readonly string[], io: CliIO): Promise<number> {
    const paint = io.color === undefined ? chalk : new chalk.Instance({ level: io.color ? 1 : 0 });

    try {
        const options = parseArgs(args, io.env);

        if (options.help) {
            io.stdout(HELP);
            return 0;
        }
        if (options.version) {
            io.stdout(VERSION);
            return 0;
        }

        let source: string;
        try {
            source = io.readInput(options.file);
        } catch (e) {
            throw createIOError(options.file ?? 'standard input', e);
        }

        const { formula } = parseDimacs(source);
        const registry = new EngineRegistry({ includeTrace: options.includeTrace });
        const engine = await registry.getEngine(options.engine);
        const result = await engine.checkSat(formula);

        for (const step of result.trace ?? []) {
            io.stderr(paint.gray(`c ${step}`));
        }
        if (options.stats) {
            for (const line of statisticsLines(engine.name, result)) {
                io.stderr(paint.dim(line));
            }
        }

        if (!result.sat || !result.assignment) {
            return 1;
        }

        if (options.verify && !satisfies(formula, result.assignment)) {
            throw createEngineError(engine.name, 'assignment does not satisfy the formula');
        }

        io.stdout(formatAssignment(result.assignment));
        return 0;
    } catch (e) {
        const message = e instanceof SatException
            ? formatSatError(e.error)
            : e instanceof Error ? e.message : String(e);
        io.stderr(`${paint.red('error:')} ${message}`);
        return 1;
    }
}

/**
 * Statistics as DIMACS comment lines.
 */
export function statisticsLines(engineName: string, result: SatResult): string[] {
    const { statistics } = result;
    const lines = [
        `c engine: ${engineName}`,
        `c result: ${result.sat ? 'SATISFIABLE' : 'UNSATISFIABLE'}`,
        `c variables: ${statistics.variables}`,
        `c clauses: ${statistics.clauses}`,
    ];
    if (statistics.decisions !== undefined) lines.push(`c decisions: ${statistics.decisions}`);
    if (statistics.propagations !== undefined) lines.push(`c propagations: ${statistics.propagations}`);
    if (statistics.conflicts !== undefined) lines.push(`c conflicts: ${statistics.conflicts}`);
    if (statistics.maxDepth !== undefined) lines.push(`c max depth: ${statistics.maxDepth}`);
    lines.push(`c time: ${statistics.timeMs}ms`);
    return lines;
}
