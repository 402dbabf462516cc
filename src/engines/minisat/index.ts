/**
 * MiniSat Engine
 *
 * Reference backend using the logic-solver package (MiniSat compiled to JS).
 * Used to cross-check the DPLL engine and selectable from the CLI.
 */

/// <reference path="../../types/logic-solver.d.ts" />

import Logic from 'logic-solver';
import { Assignment, Formula, Literal } from '../../types/formula.js';
import { createEngineError } from '../../types/errors.js';
import { variableCount } from '../../logic/clause.js';
import { validateFormula } from '../../logic/validate.js';
import { EngineCapabilities, SatEngine, SatResult } from '../interface.js';

/**
 * Convert a variable index to the solver's variable name ("x1" for index 0).
 */
export function variableToKey(variable: number): string {
    return `x${variable + 1}`;
}

function literalToTerm(lit: Literal): Logic.Formula {
    const key = variableToKey(lit.variable);
    return lit.negated ? Logic.not(key) : key;
}

export class MiniSatEngine implements SatEngine {
    readonly name = 'minisat';
    readonly capabilities: EngineCapabilities = {
        searchStatistics: false,
        trace: false,
    };

    async checkSat(formula: Formula): Promise<SatResult> {
        const startTime = Date.now();
        validateFormula(formula);

        const variables = variableCount(formula);
        const statistics = () => ({
            timeMs: Date.now() - startTime,
            variables,
            clauses: formula.length,
        });

        // Empty clause = unsatisfiable
        if (formula.some(c => c.literals.length === 0)) {
            return { sat: false, statistics: statistics() };
        }

        let solution: Logic.Solution | null;
        try {
            const solver = new Logic.Solver();
            for (const c of formula) {
                solver.require(Logic.or(...c.literals.map(literalToTerm)));
            }
            solution = solver.solve();
        } catch (e) {
            throw createEngineError(this.name, e instanceof Error ? e.message : String(e));
        }

        if (!solution) {
            return { sat: false, statistics: statistics() };
        }

        const model = solution.getMap();
        const assignment: Assignment = [];
        for (let i = 0; i < variables; i++) {
            assignment.push(model[variableToKey(i)] ?? false);
        }

        return { sat: true, assignment, statistics: statistics() };
    }
}

/**
 * Create a new MiniSat engine instance.
 */
export function createMiniSatEngine(): MiniSatEngine {
    return new MiniSatEngine();
}
