import { describe, expect, it } from 'vitest';
import { DiagnosticMessage, Parser, TokenKind, tokensFrom } from '../src/index.js';
import type { ParserOptions, Result, TokenPair } from '../src/index.js';

const {
  INT,
  BOOL,
  STRING,
  IF,
  FOR,
  IDENTIFIER,
  NUMBER,
  BOOLEAN,
  PLUS,
  MINUS,
  ASSIGN,
  GREATER,
  LESS,
  AND,
  OR,
  SEMICOLON,
  LPAREN,
  RPAREN,
  LBRACE,
  RBRACE,
  EOF,
} = TokenKind;

describe('Parser', () => {
  function parse(pairs: TokenPair[], options?: ParserOptions): Result {
    return new Parser(tokensFrom(pairs), options).program();
  }

  function rejected(message: string, line: number): Result {
    return { ok: false, diagnostic: { message, line } };
  }

  describe('program', () => {
    it('accepts an empty sequence', () => {
      expect(parse([])).toEqual({ ok: true });
    });

    it('accepts a sequence holding only EOF', () => {
      expect(parse([[EOF, 1]])).toEqual({ ok: true });
    });

    it('accepts a declaration followed by an assignment', () => {
      const result = parse([
        [INT, 1],
        [IDENTIFIER, 1],
        [SEMICOLON, 1],
        [IDENTIFIER, 2],
        [ASSIGN, 2],
        [NUMBER, 2],
        [SEMICOLON, 2],
        [EOF, 3],
      ]);

      expect(result).toEqual({ ok: true });
    });

    it('accepts a program mixing declarations, assignment and if', () => {
      const result = parse([
        [INT, 1],
        [IDENTIFIER, 1],
        [SEMICOLON, 1],
        [IDENTIFIER, 2],
        [ASSIGN, 2],
        [NUMBER, 2],
        [SEMICOLON, 2],
        [IF, 3],
        [LPAREN, 3],
        [IDENTIFIER, 3],
        [GREATER, 3],
        [NUMBER, 3],
        [RPAREN, 3],
        [LBRACE, 3],
        [IDENTIFIER, 4],
        [ASSIGN, 4],
        [IDENTIFIER, 4],
        [MINUS, 4],
        [NUMBER, 4],
        [SEMICOLON, 4],
        [RBRACE, 5],
        [EOF, 6],
      ]);

      expect(result).toEqual({ ok: true });
    });

    it('stops at the first EOF token', () => {
      const result = parse([
        [BOOL, 1],
        [IDENTIFIER, 1],
        [SEMICOLON, 1],
        [EOF, 2],
        [RBRACE, 3],
      ]);

      expect(result).toEqual({ ok: true });
    });

    it('rejects a stray closing brace at top level', () => {
      expect(parse([[RBRACE, 2]])).toEqual(rejected(DiagnosticMessage.INVALID_STATEMENT, 2));
    });
  });

  describe('declaration', () => {
    it('leaves the lookahead on the token after the semicolon', () => {
      const parser = new Parser(
        tokensFrom([
          [INT, 1],
          [IDENTIFIER, 1],
          [SEMICOLON, 1],
          [IDENTIFIER, 2],
          [ASSIGN, 2],
        ]),
      );

      expect(parser.declaration()).toEqual({ ok: true });
      expect(parser.token).toEqual({ kind: IDENTIFIER, line: 2 });
      expect(parser.position).toBe(4);
    });

    it('accepts every type keyword', () => {
      for (const type of [INT, BOOL, STRING]) {
        const result = parse([
          [type, 1],
          [IDENTIFIER, 1],
          [SEMICOLON, 1],
        ]);
        expect(result).toEqual({ ok: true });
      }
    });

    it('rejects a missing identifier on the offending line', () => {
      const result = parse([
        [BOOL, 3],
        [NUMBER, 4],
        [SEMICOLON, 4],
      ]);

      expect(result).toEqual(rejected(DiagnosticMessage.IDENTIFIER_IN_DECLARATION, 4));
    });

    it('rejects a missing semicolon', () => {
      const result = parse([
        [STRING, 1],
        [IDENTIFIER, 1],
        [ASSIGN, 2],
        [NUMBER, 2],
      ]);

      expect(result).toEqual(rejected("Missing ';' in declaration", 2));
    });

    it('rejects a declaration cut off by the end of input', () => {
      const result = parse([
        [INT, 1],
        [IDENTIFIER, 1],
      ]);

      expect(result).toEqual(rejected("Missing ';' in declaration", 1));
    });
  });

  describe('assignment', () => {
    it('rejects a missing equals sign on the line of the offending token', () => {
      const result = parse([
        [IDENTIFIER, 4],
        [NUMBER, 5],
        [SEMICOLON, 5],
        [EOF, 6],
      ]);

      expect(result).toEqual(rejected("Expected '=' in assignment", 5));
    });

    it('rejects a missing semicolon', () => {
      const result = parse([
        [IDENTIFIER, 1],
        [ASSIGN, 1],
        [NUMBER, 1],
        [IDENTIFIER, 2],
        [ASSIGN, 2],
      ]);

      expect(result).toEqual(rejected("Missing ';' in assignment", 2));
    });

    it('reads no further tokens after a failure', () => {
      const parser = new Parser(
        tokensFrom([
          [IDENTIFIER, 1],
          [NUMBER, 1],
          [SEMICOLON, 1],
          [EOF, 2],
        ]),
      );

      expect(parser.program().ok).toBe(false);
      expect(parser.token).toEqual({ kind: NUMBER, line: 1 });
      expect(parser.position).toBe(2);
    });
  });

  describe('statement', () => {
    it('rejects tokens that cannot start a statement', () => {
      for (const kind of [NUMBER, BOOLEAN, SEMICOLON, LPAREN, ASSIGN, PLUS]) {
        expect(parse([[kind, 9]])).toEqual(rejected('Invalid statement', 9));
      }
    });
  });

  describe('if', () => {
    it('accepts an empty body', () => {
      const result = parse([
        [IF, 1],
        [LPAREN, 1],
        [BOOLEAN, 1],
        [RPAREN, 1],
        [LBRACE, 1],
        [RBRACE, 1],
        [EOF, 2],
      ]);

      expect(result).toEqual({ ok: true });
    });

    it('accepts nested if statements', () => {
      const result = parse([
        [IF, 1],
        [LPAREN, 1],
        [IDENTIFIER, 1],
        [RPAREN, 1],
        [LBRACE, 1],
        [IF, 2],
        [LPAREN, 2],
        [IDENTIFIER, 2],
        [LESS, 2],
        [NUMBER, 2],
        [RPAREN, 2],
        [LBRACE, 2],
        [IDENTIFIER, 3],
        [ASSIGN, 3],
        [NUMBER, 3],
        [SEMICOLON, 3],
        [RBRACE, 4],
        [RBRACE, 5],
      ]);

      expect(result).toEqual({ ok: true });
    });

    it("rejects a missing '('", () => {
      const result = parse([
        [IF, 1],
        [IDENTIFIER, 1],
        [RPAREN, 1],
      ]);

      expect(result).toEqual(rejected("Expected '(' after if", 1));
    });

    it("rejects a missing ')'", () => {
      const result = parse([
        [IF, 1],
        [LPAREN, 1],
        [IDENTIFIER, 1],
        [LBRACE, 1],
      ]);

      expect(result).toEqual(rejected("Expected ')'", 1));
    });

    it("rejects a missing '{'", () => {
      const result = parse([
        [IF, 1],
        [LPAREN, 1],
        [IDENTIFIER, 1],
        [RPAREN, 1],
        [IDENTIFIER, 2],
        [ASSIGN, 2],
      ]);

      expect(result).toEqual(rejected("Expected '{'", 2));
    });

    it('rejects a declaration inside the body', () => {
      const result = parse([
        [IF, 1],
        [LPAREN, 1],
        [IDENTIFIER, 1],
        [RPAREN, 1],
        [LBRACE, 1],
        [INT, 2],
        [IDENTIFIER, 2],
        [SEMICOLON, 2],
        [RBRACE, 3],
      ]);

      expect(result).toEqual(rejected('Invalid statement', 2));
    });

    describe('body cut off by the end of input', () => {
      const unterminated: TokenPair[] = [
        [IF, 1],
        [LPAREN, 1],
        [IDENTIFIER, 1],
        [GREATER, 1],
        [NUMBER, 1],
        [RPAREN, 1],
        [LBRACE, 1],
        [IDENTIFIER, 2],
        [ASSIGN, 2],
        [NUMBER, 2],
        [SEMICOLON, 2],
        [EOF, 3],
      ];

      it('is reported as an invalid statement on the EOF line', () => {
        expect(parse(unterminated)).toEqual(rejected('Invalid statement', 3));
      });

      it('uses the last supplied line when EOF is implicit', () => {
        expect(parse(unterminated.slice(0, -1))).toEqual(rejected('Invalid statement', 2));
      });

      it("is reported as a missing '}' with strictBlocks", () => {
        expect(parse(unterminated, { strictBlocks: true })).toEqual(rejected("Expected '}'", 3));
      });
    });
  });

  describe('for', () => {
    const header: TokenPair[] = [
      [FOR, 1],
      [LPAREN, 1],
      [INT, 1],
      [IDENTIFIER, 1],
      [SEMICOLON, 1],
      [IDENTIFIER, 1],
      [LESS, 1],
      [NUMBER, 1],
      [SEMICOLON, 1],
      [IDENTIFIER, 1],
      [ASSIGN, 1],
      [IDENTIFIER, 1],
      [PLUS, 1],
      [NUMBER, 1],
      [SEMICOLON, 1],
      [RPAREN, 1],
    ];

    it('accepts a loop whose increment ends with a semicolon', () => {
      const result = parse([
        ...header,
        [LBRACE, 1],
        [IDENTIFIER, 2],
        [ASSIGN, 2],
        [IDENTIFIER, 2],
        [SEMICOLON, 2],
        [RBRACE, 3],
        [EOF, 3],
      ]);

      expect(result).toEqual({ ok: true });
    });

    it('accepts an if inside the loop body', () => {
      const result = parse([
        ...header,
        [LBRACE, 1],
        [IF, 2],
        [LPAREN, 2],
        [IDENTIFIER, 2],
        [RPAREN, 2],
        [LBRACE, 2],
        [RBRACE, 2],
        [RBRACE, 3],
      ]);

      expect(result).toEqual({ ok: true });
    });

    it("rejects a missing '(' after for", () => {
      const result = parse([
        [FOR, 1],
        [INT, 1],
        [IDENTIFIER, 1],
        [ASSIGN, 1],
        [NUMBER, 1],
        [SEMICOLON, 1],
        [EOF, 2],
      ]);

      expect(result).toEqual(rejected("Expected '(' after for", 1));
    });

    it('rejects a bare assignment as the init clause', () => {
      const result = parse([
        [FOR, 1],
        [LPAREN, 1],
        [IDENTIFIER, 1],
        [ASSIGN, 1],
        [NUMBER, 1],
        [SEMICOLON, 1],
      ]);

      expect(result).toEqual(rejected('Expected identifier in declaration', 1));
    });

    it('rejects a condition not followed by a semicolon', () => {
      const result = parse([
        [FOR, 1],
        [LPAREN, 1],
        [INT, 1],
        [IDENTIFIER, 1],
        [SEMICOLON, 1],
        [IDENTIFIER, 1],
        [LESS, 1],
        [NUMBER, 1],
        [RPAREN, 2],
      ]);

      expect(result).toEqual(rejected("Missing ';' in for", 2));
    });

    it('rejects an increment without its own semicolon', () => {
      const result = parse([
        [FOR, 1],
        [LPAREN, 1],
        [INT, 1],
        [IDENTIFIER, 1],
        [SEMICOLON, 1],
        [IDENTIFIER, 1],
        [SEMICOLON, 1],
        [IDENTIFIER, 1],
        [ASSIGN, 1],
        [NUMBER, 1],
        [RPAREN, 1],
        [LBRACE, 1],
        [RBRACE, 1],
      ]);

      expect(result).toEqual(rejected("Missing ';' in assignment", 1));
    });

    it("rejects a missing ')' after the increment", () => {
      const result = parse([...header.slice(0, -1), [LBRACE, 2], [RBRACE, 2]]);

      expect(result).toEqual(rejected("Expected ')'", 2));
    });

    it("rejects a missing '{'", () => {
      const result = parse([...header, [IDENTIFIER, 2]]);

      expect(result).toEqual(rejected("Expected '{'", 2));
    });

    it("reports a body cut off by EOF as a missing '}' with strictBlocks", () => {
      const result = parse([...header, [LBRACE, 1], [EOF, 4]], { strictBlocks: true });

      expect(result).toEqual(rejected("Expected '}'", 4));
    });
  });

  describe('expression', () => {
    it('accepts a chain of every binary operator', () => {
      const result = parse([
        [IDENTIFIER, 1],
        [ASSIGN, 1],
        [IDENTIFIER, 1],
        [PLUS, 1],
        [NUMBER, 1],
        [MINUS, 1],
        [NUMBER, 1],
        [GREATER, 1],
        [IDENTIFIER, 1],
        [LESS, 1],
        [NUMBER, 1],
        [AND, 1],
        [BOOLEAN, 1],
        [OR, 1],
        [BOOLEAN, 1],
        [SEMICOLON, 1],
      ]);

      expect(result).toEqual({ ok: true });
    });

    it('does not treat = as a binary operator', () => {
      const result = parse([
        [IDENTIFIER, 1],
        [ASSIGN, 1],
        [IDENTIFIER, 1],
        [ASSIGN, 1],
        [NUMBER, 1],
        [SEMICOLON, 1],
      ]);

      expect(result).toEqual(rejected("Missing ';' in assignment", 1));
    });

    it('accepts any token as an operand by default', () => {
      const result = parse([
        [IDENTIFIER, 1],
        [ASSIGN, 1],
        [SEMICOLON, 1],
        [SEMICOLON, 1],
      ]);

      expect(result).toEqual({ ok: true });
    });

    it('rejects non-operand tokens with strictOperands', () => {
      const result = parse(
        [
          [IDENTIFIER, 1],
          [ASSIGN, 1],
          [SEMICOLON, 2],
          [SEMICOLON, 2],
        ],
        { strictOperands: true },
      );

      expect(result).toEqual(rejected('Expected operand in expression', 2));
    });

    it('checks the operand after an operator with strictOperands', () => {
      const result = parse(
        [
          [IF, 1],
          [LPAREN, 1],
          [IDENTIFIER, 1],
          [AND, 1],
          [RPAREN, 1],
          [RPAREN, 1],
        ],
        { strictOperands: true },
      );

      expect(result).toEqual(rejected('Expected operand in expression', 1));
    });

    it('reports a dangling operator at the end of input as a missing semicolon', () => {
      const result = parse([
        [IDENTIFIER, 1],
        [ASSIGN, 1],
        [NUMBER, 1],
        [PLUS, 2],
      ]);

      expect(result).toEqual(rejected("Missing ';' in assignment", 2));
    });
  });

  describe('determinism', () => {
    it('gives identical results for two fresh parses', () => {
      const pairs: TokenPair[] = [
        [INT, 1],
        [IDENTIFIER, 1],
        [SEMICOLON, 1],
        [IF, 2],
        [IDENTIFIER, 2],
      ];

      const first = parse(pairs);
      const second = parse(pairs);

      expect(first).toEqual(rejected("Expected '(' after if", 2));
      expect(second).toEqual(first);
    });
  });
});
