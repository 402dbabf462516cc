import { Formula } from '../../types/formula.js';

/**
 * Find the most used variable in a formula.
 *
 * Every literal occurrence counts, so a clause mentioning a variable twice
 * counts it twice. Ties go to the lowest index; with no occurrences at all
 * the result is 0.
 */
export function dominantVariable(formula: Formula, variableCount: number): number {
    const freqs = new Array<number>(variableCount).fill(0);

    for (const c of formula) {
        for (const lit of c.literals) {
            freqs[lit.variable]++;
        }
    }

    let max = 0;
    let argmax = 0;
    for (let i = 0; i < freqs.length; i++) {
        if (freqs[i] > max) {
            max = freqs[i];
            argmax = i;
        }
    }

    return argmax;
}
