import type { SourcePosition } from './lexer.js';

/**
 * Error thrown during lexical analysis
 */
export class LexerError extends Error {
  /** The source text that failed to tokenize */
  readonly source: string;
  /** Position where the error occurred */
  readonly position: SourcePosition;

  constructor(message: string, source: string, position: SourcePosition) {
    super(`${message} at line ${position.line}, column ${position.column}`);
    this.name = 'LexerError';
    this.source = source;
    this.position = position;
  }
}
