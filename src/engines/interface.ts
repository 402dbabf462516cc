/**
 * SAT Engine Interface
 *
 * Abstract interface for pluggable satisfiability backends.
 * All engine implementations (DPLL, MiniSat) implement this interface.
 */

import { Assignment, Formula } from '../types/formula.js';

/**
 * Capabilities of a SAT engine
 */
export interface EngineCapabilities {
    /** Reports decision/propagation/conflict counters */
    searchStatistics: boolean;
    /** Can record a step-by-step search trace */
    trace: boolean;
}

/**
 * Statistics about a satisfiability check
 */
export interface SatStatistics {
    timeMs: number;
    variables: number;
    clauses: number;
    decisions?: number;
    propagations?: number;
    conflicts?: number;
    maxDepth?: number;
}

/**
 * Result of a satisfiability check
 */
export interface SatResult {
    /** Whether the formula is satisfiable */
    sat: boolean;
    /** Witness, indexed by variable, if satisfiable */
    assignment?: Assignment;
    /** Statistics about the computation */
    statistics: SatStatistics;
    /** Search trace, when requested and supported */
    trace?: string[];
}

/**
 * Abstract SAT engine interface.
 */
export interface SatEngine {
    /** Unique name of the engine */
    readonly name: string;
    /** Capabilities of this engine */
    readonly capabilities: EngineCapabilities;

    /**
     * Check satisfiability of a CNF formula.
     * The formula is validated first and never mutated.
     * @throws SatException with INVALID_FORMULA or ENGINE_ERROR
     */
    checkSat(formula: Formula): Promise<SatResult>;
}
