import type { Token } from '../tokens/token.js';
import { TokenKind } from '../tokens/token-kinds.js';
import { LexerError } from './lexer-error.js';

/**
 * Source position for error reporting
 */
export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 0-based column number */
  column: number;
  /** 0-based character offset from start of input */
  offset: number;
}

/**
 * A token with the source text it was read from
 */
export interface LexedToken extends Token {
  /** The raw string value from the source */
  readonly value: string;
  /** 0-based column of the first character */
  readonly column: number;
}

const KEYWORDS: Readonly<Record<string, TokenKind>> = {
  int: TokenKind.INT,
  bool: TokenKind.BOOL,
  string: TokenKind.STRING,
  if: TokenKind.IF,
  for: TokenKind.FOR,
  true: TokenKind.BOOLEAN,
  false: TokenKind.BOOLEAN,
};

/**
 * Lexer for SimpleLang source text
 *
 * Produces the token sequence the grammar engine consumes, always terminated
 * by a single EOF token.
 */
export class Lexer {
  private input: string = '';
  private position: number = 0;
  private line: number = 1;
  private column: number = 0;

  /**
   * Tokenize a source string
   */
  tokenize(input: string): LexedToken[] {
    this.input = input;
    this.position = 0;
    this.line = 1;
    this.column = 0;

    const tokens: LexedToken[] = [];

    while (!this.isAtEnd()) {
      this.skipTrivia();
      if (this.isAtEnd()) break;

      tokens.push(this.nextToken());
    }

    tokens.push(this.makeToken(TokenKind.EOF, '', this.currentPosition()));
    return tokens;
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.position];
  }

  private peekNext(): string {
    if (this.position + 1 >= this.input.length) return '\0';
    return this.input[this.position + 1];
  }

  private advance(): string {
    const char = this.input[this.position];
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return char;
  }

  private currentPosition(): SourcePosition {
    return {
      line: this.line,
      column: this.column,
      offset: this.position,
    };
  }

  private makeToken(kind: TokenKind, value: string, start: SourcePosition): LexedToken {
    return { kind, value, line: start.line, column: start.column };
  }

  private error(message: string, position: SourcePosition): never {
    throw new LexerError(message, this.input, position);
  }

  /**
   * Whitespace and `//` comments
   */
  private skipTrivia(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
        this.advance();
      } else if (char === '/' && this.peekNext() === '/') {
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private nextToken(): LexedToken {
    const start = this.currentPosition();
    const char = this.peek();

    if (this.isDigit(char)) {
      return this.number(start);
    }

    if (this.isAlpha(char)) {
      return this.word(start);
    }

    return this.symbol(start);
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char);
  }

  private number(start: SourcePosition): LexedToken {
    let value = '';

    while (!this.isAtEnd() && this.isDigit(this.peek())) {
      value += this.advance();
    }

    if (this.peek() === '.' && this.isDigit(this.peekNext())) {
      value += this.advance(); // consume '.'
      while (!this.isAtEnd() && this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    return this.makeToken(TokenKind.NUMBER, value, start);
  }

  private word(start: SourcePosition): LexedToken {
    let value = '';

    while (!this.isAtEnd() && this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    const keyword = Object.hasOwn(KEYWORDS, value) ? KEYWORDS[value] : undefined;
    return this.makeToken(keyword ?? TokenKind.IDENTIFIER, value, start);
  }

  private symbol(start: SourcePosition): LexedToken {
    const char = this.advance();

    switch (char) {
      case ';':
        return this.makeToken(TokenKind.SEMICOLON, char, start);
      case '(':
        return this.makeToken(TokenKind.LPAREN, char, start);
      case ')':
        return this.makeToken(TokenKind.RPAREN, char, start);
      case '{':
        return this.makeToken(TokenKind.LBRACE, char, start);
      case '}':
        return this.makeToken(TokenKind.RBRACE, char, start);
      case '+':
        return this.makeToken(TokenKind.PLUS, char, start);
      case '-':
        return this.makeToken(TokenKind.MINUS, char, start);
      case '=':
        return this.makeToken(TokenKind.ASSIGN, char, start);
      case '>':
        return this.makeToken(TokenKind.GREATER, char, start);
      case '<':
        return this.makeToken(TokenKind.LESS, char, start);

      case '&':
        if (this.peek() === '&') {
          this.advance();
          return this.makeToken(TokenKind.AND, '&&', start);
        }
        return this.error("Invalid operator '&'. Use '&&' for logical AND", start);

      case '|':
        if (this.peek() === '|') {
          this.advance();
          return this.makeToken(TokenKind.OR, '||', start);
        }
        return this.error("Invalid operator '|'. Use '||' for logical OR", start);

      default:
        return this.error(`Unexpected character '${char}'`, start);
    }
  }
}
