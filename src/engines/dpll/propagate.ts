import { Assignment, Formula, Literal } from '../../types/formula.js';
import { assign } from './simplify.js';

/**
 * Resolve unit clauses until none remain.
 *
 * A unit clause `x` forces `x = true` (and `¬x` forces `x = false`). Each forced
 * value is written to the assignment and the formula is simplified with it.
 * The first unit clause in formula order is taken each round.
 *
 * Writes are never undone; a failing branch leaves its values behind.
 *
 * @param onUnit - Called with each literal as it is propagated
 * @returns Number of literals propagated
 */
export function propagate(
    formula: Formula,
    assignment: Assignment,
    onUnit?: (lit: Literal) => void
): number {
    let count = 0;
    let unit = formula.find(c => c.literals.length === 1);

    while (unit) {
        const lit = unit.literals[0];
        const truth = !lit.negated;
        assignment[lit.variable] = truth;
        onUnit?.(lit);
        assign(formula, lit.variable, truth);
        count++;
        unit = formula.find(c => c.literals.length === 1);
    }

    return count;
}
