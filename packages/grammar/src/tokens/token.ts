import type { TokenKind } from './token-kinds.js';

/**
 * A classified lexical unit.
 *
 * Only `kind` and `line` matter to the grammar engine. Producers such as the
 * source lexer may attach more fields.
 */
export interface Token {
  readonly kind: TokenKind;
  /** 1-based source line, used only for diagnostics */
  readonly line: number;
}

export type TokenPair = readonly [kind: TokenKind, line: number];

export function token(kind: TokenKind, line: number): Token {
  return { kind, line };
}

/**
 * Build a token sequence from `[kind, line]` pairs
 *
 * @example
 * ```ts
 * tokensFrom([
 *   [TokenKind.INT, 1],
 *   [TokenKind.IDENTIFIER, 1],
 *   [TokenKind.SEMICOLON, 1],
 * ]);
 * ```
 */
export function tokensFrom(pairs: readonly TokenPair[]): Token[] {
  return pairs.map(([kind, line]) => token(kind, line));
}
