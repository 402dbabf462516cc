/**
 * DIMACS CNF Parser
 *
 * Reads the standard SAT solver input format:
 *
 *   c comment
 *   p cnf <variables> <clauses>
 *   1 -2 3 0
 *   -1 -3 0
 *
 * Literals are 1-based signed integers; each clause ends with 0 and may span
 * or share lines. Variables are converted to zero-based indices.
 */

import { Formula, Literal } from '../types/formula.js';
import { createDimacsError } from '../types/errors.js';
import { neg, pos } from '../logic/clause.js';

export interface DimacsHeader {
    variables: number;
    clauses: number;
}

export interface DimacsResult {
    header: DimacsHeader;
    formula: Formula;
}

const UNSIGNED = /^\+?\d+$/;
const SIGNED = /^[+-]?\d+$/;
const INT32_MAX = 2147483647;

function isComment(line: string): boolean {
    return line.startsWith('c');
}

function splitLines(source: string): string[] {
    return source.split(/\r?\n/);
}

/**
 * Parse a DIMACS CNF document.
 * @throws SatException with a DIMACS error code
 */
export function parseDimacs(source: string): DimacsResult {
    const lines = splitLines(source);
    const { header, next } = parseHeader(lines);
    const formula = parseFormula(lines, header, next);
    return { header, formula };
}

/**
 * Find and parse the "p cnf" line, skipping comments and blank lines.
 * @returns The header and the index of the line after it
 */
export function parseHeader(lines: readonly string[]): { header: DimacsHeader; next: number } {
    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (isComment(line)) continue;

        const tokens = line.trim().split(/\s+/).filter(t => t.length > 0);
        if (tokens.length === 0) continue;

        if (tokens[0] !== 'p') {
            throw createDimacsError('NO_HEADER', { line: i + 1, context: line });
        }

        if (tokens.length !== 4 || tokens[1] !== 'cnf' ||
            !UNSIGNED.test(tokens[2]) || !UNSIGNED.test(tokens[3])) {
            throw createDimacsError('BAD_HEADER', { line: i + 1, context: line });
        }

        const variables = Number(tokens[2]);
        const clauses = Number(tokens[3]);
        if (!Number.isSafeInteger(variables) || !Number.isSafeInteger(clauses)) {
            throw createDimacsError('BAD_HEADER', { line: i + 1, context: line });
        }

        return { header: { variables, clauses }, next: i + 1 };
    }

    throw createDimacsError('NO_HEADER');
}

interface Token {
    value: number;
    line: number;
}

/**
 * Parse the clause section that follows a header.
 *
 * All tokens are read before clauses are built, so a malformed token is
 * reported ahead of any range or count problem. Literals after the last 0
 * do not form a clause.
 *
 * @param start - Index of the first line after the header
 * @throws SatException with BAD_CLAUSE, VARIABLE_COUNT or CLAUSE_COUNT
 */
export function parseFormula(lines: readonly string[], header: DimacsHeader, start = 0): Formula {
    const tokens: Token[] = [];

    for (let i = start; i < lines.length; i++) {
        const line = lines[i];
        if (isComment(line)) continue;

        for (const text of line.trim().split(/\s+/)) {
            if (text.length === 0) continue;
            const value = Number(text);
            if (!SIGNED.test(text) || Math.abs(value) > INT32_MAX) {
                throw createDimacsError('BAD_CLAUSE', { line: i + 1, context: text });
            }
            tokens.push({ value, line: i + 1 });
        }
    }

    const formula: Formula = [];
    let literals: Literal[] = [];

    for (const { value, line } of tokens) {
        if (value === 0) {
            formula.push({ literals });
            literals = [];
            continue;
        }

        if (Math.abs(value) > header.variables) {
            throw createDimacsError('VARIABLE_COUNT', {
                line,
                context: String(value),
                details: { declared: header.variables },
            });
        }

        literals.push(value > 0 ? pos(value - 1) : neg(-value - 1));
    }

    if (formula.length !== header.clauses) {
        throw createDimacsError('CLAUSE_COUNT', {
            details: { declared: header.clauses, found: formula.length },
        });
    }

    return formula;
}
