import { Formula } from '../../types/formula.js';

/**
 * Simplify a formula in place under `variable = truth`.
 *
 * Clauses containing the literal made true are satisfied and removed.
 * Every occurrence of the literal made false is removed from the remaining
 * clauses, which may leave an empty clause (a conflict).
 *
 * This is the hottest loop of the solver, so removal swaps the last element
 * into the hole and truncates; neither clause nor literal order is preserved.
 */
export function assign(formula: Formula, variable: number, truth: boolean): void {
    // A literal holds when its sign disagrees with "negated"
    const trueNegated = !truth;

    let clauseIndex = 0;
    while (clauseIndex < formula.length) {
        const literals = formula[clauseIndex].literals;

        if (literals.some(lit => lit.variable === variable && lit.negated === trueNegated)) {
            formula[clauseIndex] = formula[formula.length - 1];
            formula.pop();
            continue;
        }

        let literalIndex = 0;
        while (literalIndex < literals.length) {
            const lit = literals[literalIndex];
            if (lit.variable === variable && lit.negated !== trueNegated) {
                literals[literalIndex] = literals[literals.length - 1];
                literals.pop();
                continue;
            }
            literalIndex++;
        }

        clauseIndex++;
    }
}
