export { TokenCursor } from './cursor.js';
export { DiagnosticMessage } from './diagnostics.js';
export { Parser } from './parser.js';
export type { ParserOptions } from './parser.js';
export { OK, failure } from './result.js';
export type { Result, SyntaxDiagnostic } from './result.js';
