/**
 * Shared test fixtures for consistent, DRY testing.
 */
import { clause, neg, pos } from '../src/logic/clause.js';
import { Assignment, Formula, Literal } from '../src/types/formula.js';

// === Common Formulas ===
export const FORMULAS = {
    // Satisfiable with duplicated literals; DPLL finds [false, true]
    duplicates: (): Formula => [
        clause(pos(0), pos(0), pos(1)),
        clause(neg(0), neg(1), neg(1)),
        clause(neg(0), pos(1), pos(1)),
    ],
    // Three pairwise XOR constraints over a 3-cycle
    xorCycle: (): Formula => [
        clause(pos(0), pos(1)),
        clause(neg(0), neg(1)),
        clause(pos(1), pos(2)),
        clause(neg(1), neg(2)),
        clause(pos(2), pos(0)),
        clause(neg(2), neg(0)),
    ],
    // Unit chain that leaves (x0 ∨ x4)
    unitChain: (): Formula => [
        clause(pos(1)),
        clause(neg(2)),
        clause(pos(1), pos(2)),
        clause(neg(1), pos(2), pos(3)),
        clause(pos(0), neg(3), pos(4)),
    ],
    // Every combination of two variables forbidden
    allForbidden: (): Formula => [
        clause(pos(0), pos(1)),
        clause(pos(0), neg(1)),
        clause(neg(0), pos(1)),
        clause(neg(0), neg(1)),
    ],
};

export const SAMPLE_DIMACS = 'c example\np cnf 3 2\n1 -2 3 0\n-1 -3 0\n';

/**
 * Three pigeons, two holes: variable 2p + h means pigeon p sits in hole h.
 */
export function pigeonhole(): Formula {
    const v = (p: number, h: number) => 2 * p + h;
    const formula: Formula = [];
    for (let p = 0; p < 3; p++) {
        formula.push(clause(pos(v(p, 0)), pos(v(p, 1))));
    }
    for (let h = 0; h < 2; h++) {
        for (let p = 0; p < 3; p++) {
            for (let q = p + 1; q < 3; q++) {
                formula.push(clause(neg(v(p, h)), neg(v(q, h))));
            }
        }
    }
    return formula;
}

/**
 * Deterministic pseudo-random 3-CNF formulas.
 */
export function randomFormulas(count: number, variables: number, clauses: number, seed = 7): Formula[] {
    let state = seed;
    const next = (bound: number) => {
        state = (state * 48271) % 2147483647;
        return state % bound;
    };

    const formulas: Formula[] = [];
    for (let f = 0; f < count; f++) {
        const formula: Formula = [];
        for (let c = 0; c < clauses; c++) {
            const literals: Literal[] = [];
            for (let k = 0; k < 3; k++) {
                const variable = next(variables);
                literals.push(next(2) === 0 ? pos(variable) : neg(variable));
            }
            formula.push({ literals });
        }
        formulas.push(formula);
    }
    return formulas;
}

/**
 * Exhaustive satisfiability check for small formulas.
 */
export function bruteForceSat(formula: Formula, variables: number): boolean {
    for (let bits = 0; bits < 1 << variables; bits++) {
        const assignment: Assignment = [];
        for (let i = 0; i < variables; i++) {
            assignment.push(((bits >> i) & 1) === 1);
        }
        if (formula.every(c => c.literals.some(l => assignment[l.variable] !== l.negated))) {
            return true;
        }
    }
    return false;
}

/**
 * Parse a printed assignment line back into signed integers.
 */
export function parseAssignmentLine(line: string): number[] {
    return line.length === 0 ? [] : line.split(' ').map(Number);
}
