/**
 * dpll-sat - Library Entry Point
 *
 * Exports the solver, the DIMACS reader/writer and the engine layer for use
 * in other projects. Nothing here touches the process or the console.
 */

// Core solver
export {
    checkSat,
    dpll,
    propagate,
    assign,
    dominantVariable,
    createSearchContext,
    DPLLEngine,
    createDPLLEngine,
} from './engines/dpll/index.js';
export type { SearchContext, SearchStatistics } from './engines/dpll/index.js';

// Engines
export { MiniSatEngine, createMiniSatEngine } from './engines/minisat/index.js';
export { EngineRegistry } from './engines/registry.js';
export type { SatEngine, SatResult, SatStatistics, EngineCapabilities } from './engines/interface.js';

// Formula utilities
export * from './logic/index.js';

// DIMACS
export * from './dimacs/index.js';

// Types and Interfaces
export * from './types/index.js';
