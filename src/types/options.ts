export type EngineName = 'dpll' | 'minisat';

export const ENGINE_NAMES: readonly EngineName[] = ['dpll', 'minisat'];

export interface SolveOptions {
    /** Record a step-by-step search trace (DPLL engine only) */
    includeTrace?: boolean;
}

export interface CliOptions extends SolveOptions {
    engine: EngineName;
    /** Input file, or undefined to read standard input */
    file?: string;
    stats: boolean;
    verify: boolean;
    help: boolean;
    version: boolean;
}

export const DEFAULTS = {
    engine: 'dpll',
    engineEnvVar: 'DPLL_SAT_ENGINE',
} as const;
