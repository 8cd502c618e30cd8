/**
 * @simplelang/grammar
 *
 * Syntax validation for SimpleLang token streams: declarations, assignment,
 * `if`, `for` and flat binary expressions. Accepts or reports the first
 * violation with its line; never builds a tree.
 */

import type { Logger } from '@simplelang/logger';
import { SimpleLangError, SimpleLangSyntaxError, errorMessage } from './errors.js';
import { Lexer } from './lexer/lexer.js';
import { Parser, type ParserOptions } from './parser/parser.js';
import type { SyntaxDiagnostic } from './parser/result.js';
import type { Token } from './tokens/token.js';

export { SimpleLangError, SimpleLangSyntaxError, errorMessage };

export * from './tokens/index.js';
export * from './parser/index.js';
export * from './lexer/index.js';

/**
 * Options for validation
 */
export interface ValidateOptions extends ParserOptions {
  /** Receives parse_started, parse_accepted and parse_rejected events */
  logger?: Logger;
}

export type ValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly diagnostic: SyntaxDiagnostic };

/**
 * Check a token sequence against the grammar
 *
 * @returns `{ valid: true }`, or the first violation found
 *
 * @example
 * ```ts
 * validate(tokensFrom([[TokenKind.INT, 1], [TokenKind.SEMICOLON, 1]]));
 * // => { valid: false, diagnostic: { message: 'Expected identifier in declaration', line: 1 } }
 * ```
 */
export function validate(tokens: readonly Token[], options: ValidateOptions = {}): ValidationResult {
  const { logger, ...parserOptions } = options;
  logger?.debug('parse_started', { tokens: tokens.length, ...parserOptions });

  const parser = new Parser(tokens, parserOptions);
  const result = parser.program();

  if (!result.ok) {
    logger?.info('parse_rejected', {
      message: result.diagnostic.message,
      line: result.diagnostic.line,
      position: parser.position,
    });
    return { valid: false, diagnostic: result.diagnostic };
  }

  logger?.debug('parse_accepted', { tokens: tokens.length });
  return { valid: true };
}

/**
 * Like validate, but throws on the first violation
 *
 * @throws {SimpleLangSyntaxError} If the tokens do not match the grammar
 */
export function assertValid(tokens: readonly Token[], options: ValidateOptions = {}): void {
  const result = validate(tokens, options);
  if (!result.valid) {
    throw new SimpleLangSyntaxError(result.diagnostic);
  }
}

/**
 * Tokenize source text and validate the result
 *
 * @throws {LexerError} If the source contains a character SimpleLang has no token for
 */
export function validateSource(source: string, options: ValidateOptions = {}): ValidationResult {
  const tokens = new Lexer().tokenize(source);
  return validate(tokens, options);
}
