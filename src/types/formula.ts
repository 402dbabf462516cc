/**
 * CNF Formula Types
 *
 * Types for representing propositional formulas in Conjunctive Normal Form.
 * Shared by the parser, the engines and the formatters.
 */

/**
 * A literal is a variable or its negation.
 * Variables are zero-based indices into an Assignment.
 */
export interface Literal {
    /** Zero-based variable index */
    readonly variable: number;
    /** Whether the variable must be false for this literal to hold */
    readonly negated: boolean;
}

/**
 * A clause is a disjunction of literals.
 * The order of literals carries no meaning and may change during simplification.
 */
export interface Clause {
    /** Literals in this clause (implicitly disjunctive) */
    literals: Literal[];
}

/**
 * A CNF formula is a conjunction of clauses.
 */
export type Formula = Clause[];

/**
 * Truth value of each variable, indexed by variable.
 */
export type Assignment = boolean[];
