import type { Token } from '../tokens/token.js';
import { TokenKind, isBinaryOperator, isOperand, isTypeKeyword } from '../tokens/token-kinds.js';
import { TokenCursor } from './cursor.js';
import { DiagnosticMessage } from './diagnostics.js';
import { OK, failure, type Result } from './result.js';

export interface ParserOptions {
  /** Report a block body that runs into EOF as a missing '}' */
  strictBlocks?: boolean;
  /** Require identifiers, numbers or booleans as expression operands */
  strictOperands?: boolean;
}

/**
 * Recursive descent recognizer for SimpleLang
 *
 * Grammar:
 *
 *   program     := (declaration | statement)* EOF
 *   declaration := type IDENTIFIER ';'
 *   statement   := assignment | if | for
 *   assignment  := IDENTIFIER '=' expression ';'
 *   if          := 'if' '(' expression ')' '{' statement* '}'
 *   for         := 'for' '(' declaration expression ';' assignment ')' '{' statement* '}'
 *   expression  := operand (operator operand)*
 *
 * The engine holds one token of lookahead and builds nothing. Each production
 * returns a Result; the first failure is returned unchanged through every
 * enclosing production and no further tokens are read.
 *
 * An instance is good for a single parse.
 */
export class Parser {
  private readonly cursor: TokenCursor;
  private readonly strictBlocks: boolean;
  private readonly strictOperands: boolean;
  private current: Token;

  constructor(tokens: readonly Token[] | TokenCursor, options: ParserOptions = {}) {
    this.cursor = tokens instanceof TokenCursor ? tokens : new TokenCursor(tokens);
    this.strictBlocks = options.strictBlocks ?? false;
    this.strictOperands = options.strictOperands ?? false;
    this.current = this.cursor.advance();
  }

  /** The lookahead token */
  get token(): Token {
    return this.current;
  }

  get line(): number {
    return this.current.line;
  }

  /** Tokens read from the cursor so far, including the lookahead */
  get position(): number {
    return this.cursor.position;
  }

  // Token navigation

  private advance(): void {
    this.current = this.cursor.advance();
  }

  private check(kind: TokenKind): boolean {
    return this.current.kind === kind;
  }

  private fail(message: string): Result {
    return failure(message, this.current.line);
  }

  /**
   * Require the lookahead to be `kind` and step past it
   */
  private expect(kind: TokenKind, message: string): Result {
    if (!this.check(kind)) return this.fail(message);
    this.advance();
    return OK;
  }

  // Productions

  program(): Result {
    while (!this.check(TokenKind.EOF)) {
      const result = isTypeKeyword(this.current.kind) ? this.declaration() : this.statement();
      if (!result.ok) return result;
    }
    return OK;
  }

  /**
   * The caller has already seen the type keyword, so it is consumed without a
   * check. The for-loop header relies on this too.
   */
  declaration(): Result {
    this.advance();

    const name = this.expect(TokenKind.IDENTIFIER, DiagnosticMessage.IDENTIFIER_IN_DECLARATION);
    if (!name.ok) return name;

    return this.expect(TokenKind.SEMICOLON, DiagnosticMessage.SEMICOLON_IN_DECLARATION);
  }

  statement(): Result {
    switch (this.current.kind) {
      case TokenKind.IDENTIFIER:
        return this.assignment();
      case TokenKind.IF:
        return this.ifStatement();
      case TokenKind.FOR:
        return this.forStatement();
      default:
        return this.fail(DiagnosticMessage.INVALID_STATEMENT);
    }
  }

  assignment(): Result {
    this.advance(); // identifier

    const assign = this.expect(TokenKind.ASSIGN, DiagnosticMessage.ASSIGN_IN_ASSIGNMENT);
    if (!assign.ok) return assign;

    const value = this.expression();
    if (!value.ok) return value;

    return this.expect(TokenKind.SEMICOLON, DiagnosticMessage.SEMICOLON_IN_ASSIGNMENT);
  }

  ifStatement(): Result {
    this.advance(); // if

    const open = this.expect(TokenKind.LPAREN, DiagnosticMessage.LPAREN_AFTER_IF);
    if (!open.ok) return open;

    const condition = this.expression();
    if (!condition.ok) return condition;

    const close = this.expect(TokenKind.RPAREN, DiagnosticMessage.RPAREN);
    if (!close.ok) return close;

    return this.block();
  }

  /**
   * The increment clause is a full assignment and so carries its own ';'
   * before the closing parenthesis: `for (int i; i < 10; i = i + 1;) { ... }`
   */
  forStatement(): Result {
    this.advance(); // for

    const open = this.expect(TokenKind.LPAREN, DiagnosticMessage.LPAREN_AFTER_FOR);
    if (!open.ok) return open;

    const init = this.declaration();
    if (!init.ok) return init;

    const condition = this.expression();
    if (!condition.ok) return condition;

    const separator = this.expect(TokenKind.SEMICOLON, DiagnosticMessage.SEMICOLON_IN_FOR);
    if (!separator.ok) return separator;

    const increment = this.assignment();
    if (!increment.ok) return increment;

    const close = this.expect(TokenKind.RPAREN, DiagnosticMessage.RPAREN);
    if (!close.ok) return close;

    return this.block();
  }

  /**
   * Operand kinds are only checked under strictOperands. Operators are
   * always checked, which is what ends the expression.
   */
  expression(): Result {
    const first = this.operand();
    if (!first.ok) return first;

    while (isBinaryOperator(this.current.kind)) {
      this.advance(); // operator
      const next = this.operand();
      if (!next.ok) return next;
    }
    return OK;
  }

  private operand(): Result {
    if (this.strictOperands && !isOperand(this.current.kind)) {
      return this.fail(DiagnosticMessage.OPERAND);
    }
    this.advance();
    return OK;
  }

  /**
   * '{' statement* '}'
   *
   * Without strictBlocks, a body cut off by EOF is reported by `statement`
   * as an invalid statement on the EOF token.
   */
  private block(): Result {
    const open = this.expect(TokenKind.LBRACE, DiagnosticMessage.LBRACE);
    if (!open.ok) return open;

    while (!this.check(TokenKind.RBRACE)) {
      if (this.strictBlocks && this.check(TokenKind.EOF)) {
        return this.fail(DiagnosticMessage.RBRACE);
      }
      const result = this.statement();
      if (!result.ok) return result;
    }
    this.advance(); // }
    return OK;
  }
}
