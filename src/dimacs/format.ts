import { Assignment, Formula, Literal } from '../types/formula.js';
import { variableCount } from '../logic/clause.js';

/**
 * Format an assignment as 1-based signed integers: "1 -2 3".
 * An empty assignment gives an empty string.
 */
export function formatAssignment(assignment: Assignment): string {
    return assignment.map((truth, i) => (truth ? `${i + 1}` : `-${i + 1}`)).join(' ');
}

function literalToDimacs(lit: Literal): string {
    return lit.negated ? `-${lit.variable + 1}` : `${lit.variable + 1}`;
}

/**
 * Convert a formula to DIMACS CNF format.
 *
 * Each clause is a line of space-separated integers ending with 0.
 *
 * @param variables - Declared variable count; defaults to the count the formula implies
 */
export function formatDimacs(formula: Formula, variables: number = variableCount(formula)): string {
    const clauseLines = formula.map(c => [...c.literals.map(literalToDimacs), '0'].join(' '));
    const header = `p cnf ${variables} ${formula.length}`;
    return [header, ...clauseLines].join('\n') + '\n';
}
