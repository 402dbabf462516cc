/**
 * Core Logic Modules
 *
 * Centralizes exports for formula construction, evaluation and validation.
 */

export * from './clause.js';
export * from './validate.js';
