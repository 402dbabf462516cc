import { runCli, CliIO, statisticsLines } from '../src/cli/run.js';
import { parseArgs, HELP, VERSION } from '../src/cli/options.js';
import { SatException } from '../src/types/errors.js';
import { satisfies } from '../src/logic/clause.js';
import { parseDimacs } from '../src/dimacs/parser.js';
import { SAMPLE_DIMACS, parseAssignmentLine } from './fixtures.js';

interface FakeIO extends CliIO {
    out: string[];
    err: string[];
    files: (string | undefined)[];
}

function createFakeIO(input: string, env: Record<string, string | undefined> = {}): FakeIO {
    const io: FakeIO = {
        out: [],
        err: [],
        files: [],
        env,
        color: false,
        readInput: file => {
            io.files.push(file);
            return input;
        },
        stdout: line => io.out.push(line),
        stderr: line => io.err.push(line),
    };
    return io;
}

const UNSAT_DIMACS = 'p cnf 1 2\n1 0\n-1 0\n';

describe('runCli', () => {
    test('prints the assignment of a satisfiable formula', async () => {
        const io = createFakeIO(SAMPLE_DIMACS);
        expect(await runCli([], io)).toBe(0);
        expect(io.out).toEqual(['1 -2 -3']);
        expect(io.err).toEqual([]);
        expect(io.files).toEqual([undefined]);
    });

    test('prints nothing and fails for an unsatisfiable formula', async () => {
        const io = createFakeIO(UNSAT_DIMACS);
        expect(await runCli([], io)).toBe(1);
        expect(io.out).toEqual([]);
        expect(io.err).toEqual([]);
    });

    test('prints an empty line for a formula without clauses', async () => {
        const io = createFakeIO('p cnf 0 0\n');
        expect(await runCli([], io)).toBe(0);
        expect(io.out).toEqual(['']);
    });

    test('reports parse errors with the line number', async () => {
        const io = createFakeIO('1 2 0\n');
        expect(await runCli([], io)).toBe(1);
        expect(io.out).toEqual([]);
        expect(io.err).toEqual(['error: no header (line 1)']);
    });

    test('reports a clause count mismatch', async () => {
        const io = createFakeIO('p cnf 2 2\n1 2 0\n');
        expect(await runCli([], io)).toBe(1);
        expect(io.err).toEqual(['error: unexpected number of clauses']);
    });

    test('reads the named file, or standard input for "-"', async () => {
        const named = createFakeIO(SAMPLE_DIMACS);
        await runCli(['problem.cnf'], named);
        expect(named.files).toEqual(['problem.cnf']);

        const dash = createFakeIO(SAMPLE_DIMACS);
        await runCli(['-'], dash);
        expect(dash.files).toEqual([undefined]);
    });

    test('reports unreadable input', async () => {
        const io = createFakeIO('');
        io.readInput = () => {
            throw new Error('ENOENT');
        };
        expect(await runCli(['missing.cnf'], io)).toBe(1);
        expect(io.err).toEqual(['error: Cannot read missing.cnf: ENOENT']);
    });

    test('prints statistics to standard error', async () => {
        const io = createFakeIO(SAMPLE_DIMACS);
        expect(await runCli(['--stats'], io)).toBe(0);
        expect(io.out).toEqual(['1 -2 -3']);
        expect(io.err.slice(0, 8)).toEqual([
            'c engine: dpll',
            'c result: SATISFIABLE',
            'c variables: 3',
            'c clauses: 2',
            'c decisions: 1',
            'c propagations: 2',
            'c conflicts: 0',
            'c max depth: 1',
        ]);
        expect(io.err[8]).toMatch(/^c time: \d+ms$/);
    });

    test('prints the search trace to standard error', async () => {
        const io = createFakeIO(SAMPLE_DIMACS);
        expect(await runCli(['--trace'], io)).toBe(0);
        expect(io.err).toEqual([
            'c decide x0',
            'c   propagate x0',
            'c   propagate ¬x2',
            'c   satisfied',
        ]);
    });

    test('solves with the MiniSat engine', async () => {
        const io = createFakeIO(SAMPLE_DIMACS);
        expect(await runCli(['--engine', 'minisat', '--verify'], io)).toBe(0);
        expect(io.out).toHaveLength(1);

        const values = parseAssignmentLine(io.out[0]);
        expect(values.map(Math.abs)).toEqual([1, 2, 3]);
        expect(satisfies(parseDimacs(SAMPLE_DIMACS).formula, values.map(v => v > 0))).toBe(true);
    });

    test('takes the engine from the environment', async () => {
        const io = createFakeIO(UNSAT_DIMACS, { DPLL_SAT_ENGINE: 'minisat' });
        expect(await runCli(['--stats'], io)).toBe(1);
        expect(io.err.slice(0, 4)).toEqual([
            'c engine: minisat',
            'c result: UNSATISFIABLE',
            'c variables: 1',
            'c clauses: 2',
        ]);
        expect(io.err[4]).toMatch(/^c time: \d+ms$/);
    });

    test('rejects an unknown engine', async () => {
        const io = createFakeIO(SAMPLE_DIMACS);
        expect(await runCli(['--engine=z3'], io)).toBe(1);
        expect(io.err).toEqual(["error: Invalid engine 'z3'. Valid options are: dpll, minisat"]);
        expect(io.files).toEqual([]);
    });

    test('rejects tracing with the MiniSat engine', async () => {
        const io = createFakeIO(SAMPLE_DIMACS);
        expect(await runCli(['--engine=minisat', '--trace'], io)).toBe(1);
        expect(io.err).toEqual(['error: --trace is only supported by the dpll engine']);
    });

    test('shows help and version', async () => {
        const help = createFakeIO('');
        expect(await runCli(['--help'], help)).toBe(0);
        expect(help.out).toEqual([HELP]);

        const version = createFakeIO('');
        expect(await runCli(['-v'], version)).toBe(0);
        expect(version.out).toEqual([VERSION]);
    });
});

describe('parseArgs', () => {
    test('applies defaults', () => {
        expect(parseArgs([])).toEqual({
            engine: 'dpll',
            stats: false,
            verify: false,
            includeTrace: false,
            help: false,
            version: false,
        });
    });

    test('prefers the command line over the environment', () => {
        const options = parseArgs(['--engine=dpll', 'a.cnf'], { DPLL_SAT_ENGINE: 'minisat' });
        expect(options.engine).toBe('dpll');
        expect(options.file).toBe('a.cnf');
    });

    test('ignores an empty environment value', () => {
        expect(parseArgs([], { DPLL_SAT_ENGINE: '' }).engine).toBe('dpll');
    });

    const invalid: [string[], string][] = [
        [['--fast'], "Unknown option '--fast'"],
        [['a.cnf', 'b.cnf'], 'Only one input file may be given'],
        [['--engine'], '--engine requires a value'],
    ];

    test.each(invalid)('rejects %j', (args, message) => {
        let caught: unknown;
        try {
            parseArgs(args);
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(SatException);
        expect(caught).toMatchObject({ error: { code: 'INVALID_OPTION', message } });
    });
});

describe('statisticsLines', () => {
    test('omits search counters the engine does not report', () => {
        const lines = statisticsLines('minisat', {
            sat: true,
            assignment: [true],
            statistics: { timeMs: 5, variables: 1, clauses: 1 },
        });
        expect(lines).toEqual([
            'c engine: minisat',
            'c result: SATISFIABLE',
            'c variables: 1',
            'c clauses: 1',
            'c time: 5ms',
        ]);
    });
});
