/**
 * DPLL Engine
 *
 * Recursive Davis–Putnam–Logemann–Loveland search with unit propagation
 * and a most-frequent-variable branching rule.
 */

import { Assignment, Formula } from '../../types/formula.js';
import { SolveOptions } from '../../types/options.js';
import { variableCount } from '../../logic/clause.js';
import { validateFormula } from '../../logic/validate.js';
import { EngineCapabilities, SatEngine, SatResult } from '../interface.js';
import { createSearchContext, dpll, SearchContext } from './search.js';

export { assign } from './simplify.js';
export { propagate } from './propagate.js';
export { dominantVariable } from './branch.js';
export { dpll, createSearchContext } from './search.js';
export type { SearchContext, SearchStatistics } from './search.js';

/**
 * Solve a satisfiability problem given as a CNF formula.
 *
 * Returns a satisfying assignment sized to the highest referenced variable,
 * or null if the formula is unsatisfiable. The formula is not modified.
 */
export function checkSat(formula: Formula, context?: SearchContext): Assignment | null {
    const assignment: Assignment = new Array<boolean>(variableCount(formula)).fill(false);
    return dpll(formula, assignment, context) ? assignment : null;
}

/**
 * SatEngine wrapper around checkSat that validates input and reports statistics.
 */
export class DPLLEngine implements SatEngine {
    readonly name = 'dpll';
    readonly capabilities: EngineCapabilities = {
        searchStatistics: true,
        trace: true,
    };

    constructor(private readonly options: SolveOptions = {}) {}

    async checkSat(formula: Formula): Promise<SatResult> {
        const startTime = Date.now();
        validateFormula(formula);

        const context = createSearchContext(this.options.includeTrace ?? false);
        const assignment = checkSat(formula, context);

        return {
            sat: assignment !== null,
            ...(assignment && { assignment }),
            statistics: {
                timeMs: Date.now() - startTime,
                variables: variableCount(formula),
                clauses: formula.length,
                ...context.statistics,
            },
            ...(context.trace && { trace: context.trace }),
        };
    }
}

/**
 * Create a new DPLL engine instance.
 */
export function createDPLLEngine(options?: SolveOptions): DPLLEngine {
    return new DPLLEngine(options);
}
