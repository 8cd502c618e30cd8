/**
 * Error types for SimpleLang
 *
 * The grammar engine itself never throws; these are raised by the entry
 * points that turn a rejected parse or bad source text into an exception.
 */

import type { SyntaxDiagnostic } from './parser/result.js';

/**
 * Base class for SimpleLang errors
 */
export abstract class SimpleLangError extends Error {
  /** Line where the error occurred */
  readonly line: number;

  constructor(message: string, line: number) {
    super(`${message} at line ${line}`);
    this.name = this.constructor.name;
    this.line = line;
  }
}

/**
 * Thrown when a token sequence does not match the grammar
 */
export class SimpleLangSyntaxError extends SimpleLangError {
  readonly diagnostic: SyntaxDiagnostic;

  constructor(diagnostic: SyntaxDiagnostic) {
    super(diagnostic.message, diagnostic.line);
    this.diagnostic = diagnostic;
  }
}

/**
 * Extract just the error message from an unknown error value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
