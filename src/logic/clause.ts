/**
 * CNF Clause Utilities
 *
 * Construction, copying, evaluation and printing of literals, clauses and formulas.
 */

import { Assignment, Clause, Formula, Literal } from '../types/formula.js';

/**
 * Positive literal: holds when the variable is true.
 */
export function pos(variable: number): Literal {
    return { variable, negated: false };
}

/**
 * Negated literal: holds when the variable is false.
 */
export function neg(variable: number): Literal {
    return { variable, negated: true };
}

/**
 * Build a clause from literals.
 */
export function clause(...literals: Literal[]): Clause {
    return { literals };
}

export function literalEquals(a: Literal, b: Literal): boolean {
    return a.variable === b.variable && a.negated === b.negated;
}

/**
 * The literal of the same variable with the opposite sign.
 */
export function complement(lit: Literal): Literal {
    return { variable: lit.variable, negated: !lit.negated };
}

/**
 * The literal that a truth value makes true for a variable.
 */
export function literalFor(variable: number, truth: boolean): Literal {
    return truth ? pos(variable) : neg(variable);
}

/**
 * Copy the clause structure of a formula.
 * Literals are immutable and shared; clause arrays are fresh.
 */
export function cloneFormula(formula: Formula): Formula {
    return formula.map(c => ({ literals: c.literals.slice() }));
}

/**
 * One more than the highest variable index referenced, or 0 without literals.
 */
export function variableCount(formula: Formula): number {
    let count = 0;
    for (const c of formula) {
        for (const lit of c.literals) {
            if (lit.variable >= count) {
                count = lit.variable + 1;
            }
        }
    }
    return count;
}

/**
 * Check whether a literal holds under an assignment.
 * Variables outside the assignment read as false.
 */
export function evaluateLiteral(lit: Literal, assignment: Assignment): boolean {
    const value = assignment[lit.variable] ?? false;
    return lit.negated ? !value : value;
}

export function evaluateClause(c: Clause, assignment: Assignment): boolean {
    return c.literals.some(lit => evaluateLiteral(lit, assignment));
}

/**
 * Check that an assignment satisfies every clause of a formula.
 */
export function satisfies(formula: Formula, assignment: Assignment): boolean {
    return formula.every(c => evaluateClause(c, assignment));
}

/**
 * Format a literal as a string, e.g. "x3" or "¬x3".
 */
export function literalToString(lit: Literal): string {
    return lit.negated ? `¬x${lit.variable}` : `x${lit.variable}`;
}

/**
 * Format a clause as a string (disjunction of literals).
 */
export function clauseToString(c: Clause): string {
    if (c.literals.length === 0) return '□'; // Empty clause = false
    return c.literals.map(literalToString).join(' ∨ ');
}

/**
 * Format CNF as a string (conjunction of clauses).
 */
export function formulaToString(formula: Formula): string {
    if (formula.length === 0) return '⊤'; // No clauses = true
    return formula.map(c => `(${clauseToString(c)})`).join(' ∧ ');
}
