import type { Token } from '../tokens/token.js';
import { TokenKind } from '../tokens/token-kinds.js';

/**
 * Forward-only reader over a token sequence
 *
 * Has no grammar knowledge and never fails. Once the sequence is exhausted,
 * every read yields a synthetic EOF token. Its line repeats the last supplied
 * token's line (1 for an empty sequence) and is not meaningful.
 */
export class TokenCursor {
  private readonly tokens: readonly Token[];
  private readonly endOfInput: Token;
  private index: number = 0;

  constructor(tokens: readonly Token[]) {
    this.tokens = tokens;
    const last = tokens.length > 0 ? tokens[tokens.length - 1] : undefined;
    this.endOfInput = { kind: TokenKind.EOF, line: last?.line ?? 1 };
  }

  /** Number of tokens handed out so far, capped at the sequence length */
  get position(): number {
    return this.index;
  }

  get done(): boolean {
    return this.index >= this.tokens.length;
  }

  advance(): Token {
    const next = this.tokens[this.index];
    if (next === undefined) {
      return this.endOfInput;
    }
    this.index++;
    return next;
  }
}
