/**
 * Shared type definitions
 */

// Re-export error types
export {
    SatException,
    createDimacsError,
    createIOError,
    createInvalidFormulaError,
    createInvalidOptionError,
    createEngineError,
    serializeSatError,
    formatSatError,
} from './errors.js';

export type {
    SatErrorCode,
    DimacsErrorCode,
    ErrorSpan,
    SatError,
} from './errors.js';

// Re-export formula types
export type {
    Literal,
    Clause,
    Formula,
    Assignment,
} from './formula.js';

// Re-export options
export {
    DEFAULTS,
    ENGINE_NAMES,
} from './options.js';

export type {
    EngineName,
    SolveOptions,
    CliOptions,
} from './options.js';
