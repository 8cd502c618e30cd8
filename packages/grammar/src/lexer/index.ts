export { Lexer } from './lexer.js';
export type { LexedToken, SourcePosition } from './lexer.js';
export { LexerError } from './lexer-error.js';
