/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 * Unsatisfiability is a result, not an error, and has no code here.
 */

/**
 * Error codes for parsing, validation and solving
 */
export type SatErrorCode =
  | 'NO_HEADER'         // No "p cnf" line before the clauses
  | 'BAD_HEADER'        // Malformed "p" line
  | 'BAD_CLAUSE'        // Non-integer token in the clause section
  | 'VARIABLE_COUNT'    // Literal outside the declared variable range
  | 'CLAUSE_COUNT'      // Clause count differs from the header
  | 'IO_ERROR'          // Input could not be read
  | 'INVALID_FORMULA'   // Formula object violates the model invariants
  | 'INVALID_OPTION'    // Bad command-line option or engine name
  | 'ENGINE_ERROR';     // Backend failure or invalid witness

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  line: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface SatError {
  code: SatErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending line or token
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping SatError for throw/catch patterns
 */
export class SatException extends Error {
  public readonly error: SatError;

  constructor(error: SatError) {
    super(error.message);
    this.name = 'SatException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SatException);
    }
  }

  get code(): SatErrorCode {
    return this.error.code;
  }

  toJSON(): SatError {
    return this.error;
  }
}

export type DimacsErrorCode = Extract<
  SatErrorCode,
  'NO_HEADER' | 'BAD_HEADER' | 'BAD_CLAUSE' | 'VARIABLE_COUNT' | 'CLAUSE_COUNT'
>;

const DIMACS_MESSAGES: Record<DimacsErrorCode, string> = {
  NO_HEADER: 'no header',
  BAD_HEADER: 'bad header',
  BAD_CLAUSE: 'bad clause',
  VARIABLE_COUNT: 'unexpected number of variables',
  CLAUSE_COUNT: 'unexpected number of clauses',
};

const DIMACS_SUGGESTIONS: Record<DimacsErrorCode, string> = {
  NO_HEADER: "Start the input with a header line such as 'p cnf 3 2'",
  BAD_HEADER: "The header must read 'p cnf <variables> <clauses>' with non-negative integers",
  BAD_CLAUSE: 'Clauses may only contain signed integers, each clause terminated by 0',
  VARIABLE_COUNT: 'Increase the variable count in the header or renumber the literals',
  CLAUSE_COUNT: 'Make the clause count in the header match the number of 0-terminated clauses',
};

/**
 * Create a DIMACS parse error
 */
export function createDimacsError(
  code: DimacsErrorCode,
  options: { line?: number; context?: string; details?: Record<string, unknown> } = {}
): SatException {
  return new SatException({
    code,
    message: DIMACS_MESSAGES[code],
    ...(options.line !== undefined && { span: { line: options.line } }),
    suggestion: DIMACS_SUGGESTIONS[code],
    ...(options.context !== undefined && { context: options.context }),
    ...(options.details && { details: options.details }),
  });
}

/**
 * Create an error for input that could not be read
 */
export function createIOError(source: string, cause: unknown): SatException {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new SatException({
    code: 'IO_ERROR',
    message: `Cannot read ${source}: ${reason}`,
    details: { source },
  });
}

/**
 * Create an error for a formula object that breaks the model invariants
 */
export function createInvalidFormulaError(
  message: string,
  details?: Record<string, unknown>
): SatException {
  return new SatException({
    code: 'INVALID_FORMULA',
    message: `Invalid formula: ${message}`,
    details,
  });
}

/**
 * Create an invalid option error
 */
export function createInvalidOptionError(
  message: string,
  suggestion?: string
): SatException {
  return new SatException({
    code: 'INVALID_OPTION',
    message,
    ...(suggestion && { suggestion }),
  });
}

/**
 * Create an engine error
 */
export function createEngineError(
  engine: string,
  message: string,
  details?: Record<string, unknown>
): SatException {
  return new SatException({
    code: 'ENGINE_ERROR',
    message: `${engine} engine error: ${message}`,
    details,
  });
}

/**
 * Serialize a SatError for JSON output
 */
export function serializeSatError(error: SatError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * One-line description for terminal output, e.g. "bad clause (line 4)"
 */
export function formatSatError(error: SatError): string {
  return error.span ? `${error.message} (line ${error.span.line})` : error.message;
}
