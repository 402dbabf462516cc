export { parseDimacs, parseHeader, parseFormula } from './parser.js';
export type { DimacsHeader, DimacsResult } from './parser.js';
export { formatAssignment, formatDimacs } from './format.js';
