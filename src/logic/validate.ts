/**
 * Formula Validation
 *
 * Boundary check for formulas that did not come from the DIMACS parser.
 * The search itself assumes a well-formed formula and never re-checks.
 */

import { z } from 'zod';
import { Formula } from '../types/formula.js';
import { createInvalidFormulaError } from '../types/errors.js';

/** Largest variable index, matching the parser's 32-bit literal range */
export const MAX_VARIABLE = 2147483646;

const literalSchema = z.object({
    variable: z.number().int().nonnegative().max(MAX_VARIABLE),
    negated: z.boolean(),
});

const formulaSchema = z.array(z.object({
    literals: z.array(literalSchema),
}));

/**
 * Describe where an issue sits, e.g. "literal 2 of clause 0".
 */
function issueLocation(path: (string | number)[]): string {
    const [clauseIndex, , literalIndex, field] = path;
    if (clauseIndex === undefined) return 'formula';
    if (literalIndex === undefined) return `clause ${clauseIndex}`;
    const where = `literal ${literalIndex} of clause ${clauseIndex}`;
    return field === undefined ? where : `${where} (${field})`;
}

/**
 * Throw INVALID_FORMULA unless the value is an array of clauses whose
 * literals carry a variable in [0, MAX_VARIABLE] and a boolean sign.
 */
export function validateFormula(value: unknown): asserts value is Formula {
    const parsed = formulaSchema.safeParse(value);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const [clauseIndex, , literalIndex] = issue.path;
        throw createInvalidFormulaError(`${issueLocation(issue.path)}: ${issue.message}`, {
            ...(typeof clauseIndex === 'number' && { clauseIndex }),
            ...(typeof literalIndex === 'number' && { literalIndex }),
        });
    }
}
