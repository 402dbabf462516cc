import { Assignment, Formula } from '../../types/formula.js';
import { cloneFormula, literalToString, neg, pos } from '../../logic/clause.js';
import { propagate } from './propagate.js';
import { dominantVariable } from './branch.js';

/**
 * Counters collected during a search
 */
export interface SearchStatistics {
    /** Branching decisions (each truth value tried counts once) */
    decisions: number;
    /** Literals fixed by unit propagation, including decided ones */
    propagations: number;
    /** Branches that ended with an empty clause */
    conflicts: number;
    /** Deepest recursion level reached (top level is 0) */
    maxDepth: number;
}

/**
 * Optional bookkeeping threaded through the recursion.
 * Nothing recorded here influences the search.
 */
export interface SearchContext {
    statistics: SearchStatistics;
    /** Step-by-step log, when requested */
    trace?: string[];
}

export function createSearchContext(includeTrace = false): SearchContext {
    return {
        statistics: { decisions: 0, propagations: 0, conflicts: 0, maxDepth: 0 },
        ...(includeTrace && { trace: [] }),
    };
}

/**
 * DPLL: propagate, stop on an empty formula or an empty clause, otherwise
 * branch on the dominant variable, trying true before false.
 *
 * The formula is copied on entry so sibling branches never share clause state.
 * The assignment is shared by every level and only the successful path's
 * writes are meaningful.
 */
export function dpll(
    formula: Formula,
    assignment: Assignment,
    context?: SearchContext,
    depth = 0
): boolean {
    const working = cloneFormula(formula);
    const trace = context?.trace;

    if (context && depth > context.statistics.maxDepth) {
        context.statistics.maxDepth = depth;
    }

    const propagated = propagate(
        working,
        assignment,
        trace && (lit => trace.push(`${indent(depth)}propagate ${literalToString(lit)}`))
    );
    if (context) {
        context.statistics.propagations += propagated;
    }

    if (working.length === 0) {
        trace?.push(`${indent(depth)}satisfied`);
        return true;
    }

    if (working.some(c => c.literals.length === 0)) {
        if (context) {
            context.statistics.conflicts++;
        }
        trace?.push(`${indent(depth)}conflict`);
        return false;
    }

    const variable = dominantVariable(working, assignment.length);

    working.push({ literals: [pos(variable)] });
    if (context) {
        context.statistics.decisions++;
    }
    trace?.push(`${indent(depth)}decide ${literalToString(pos(variable))}`);
    if (dpll(working, assignment, context, depth + 1)) {
        return true;
    }

    working.pop();
    working.push({ literals: [neg(variable)] });
    if (context) {
        context.statistics.decisions++;
    }
    trace?.push(`${indent(depth)}decide ${literalToString(neg(variable))}`);
    return dpll(working, assignment, context, depth + 1);
}

function indent(depth: number): string {
    return '  '.repeat(depth);
}
