/**
 * Token kinds for SimpleLang
 *
 * The set is closed: the lexer only ever produces these, and the grammar
 * engine dispatches on them.
 */

export const TokenKind = {
  // Type keywords
  INT: 'Int', // int
  BOOL: 'Bool', // bool
  STRING: 'String', // string

  // Control keywords
  IF: 'If', // if
  FOR: 'For', // for

  // Names and literals
  IDENTIFIER: 'Identifier', // x, total, _tmp
  NUMBER: 'Number', // 42, 3.5
  BOOLEAN: 'Boolean', // true, false

  // Operators
  PLUS: 'Plus', // +
  MINUS: 'Minus', // -
  ASSIGN: 'Assign', // =
  GREATER: 'Greater', // >
  LESS: 'Less', // <
  AND: 'And', // &&
  OR: 'Or', // ||

  // Punctuation
  SEMICOLON: 'Semicolon', // ;
  LPAREN: 'LParen', // (
  RPAREN: 'RParen', // )
  LBRACE: 'LBrace', // {
  RBRACE: 'RBrace', // }

  // End of input
  EOF: 'EOF',
} as const;

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind];

export const TOKEN_KINDS: readonly TokenKind[] = Object.values(TokenKind);

export type TypeKeyword = typeof TokenKind.INT | typeof TokenKind.BOOL | typeof TokenKind.STRING;

export type BinaryOperator =
  | typeof TokenKind.PLUS
  | typeof TokenKind.MINUS
  | typeof TokenKind.GREATER
  | typeof TokenKind.LESS
  | typeof TokenKind.AND
  | typeof TokenKind.OR;

export type OperandKind = typeof TokenKind.IDENTIFIER | typeof TokenKind.NUMBER | typeof TokenKind.BOOLEAN;

export function isTokenKind(value: unknown): value is TokenKind {
  return TOKEN_KINDS.some((kind) => kind === value);
}

export function isTypeKeyword(kind: TokenKind): kind is TypeKeyword {
  switch (kind) {
    case TokenKind.INT:
    case TokenKind.BOOL:
    case TokenKind.STRING:
      return true;
    default:
      return false;
  }
}

/**
 * Operators that may join two operands inside an expression.
 * Assignment is deliberately absent.
 */
export function isBinaryOperator(kind: TokenKind): kind is BinaryOperator {
  switch (kind) {
    case TokenKind.PLUS:
    case TokenKind.MINUS:
    case TokenKind.GREATER:
    case TokenKind.LESS:
    case TokenKind.AND:
    case TokenKind.OR:
      return true;
    default:
      return false;
  }
}

export function isOperand(kind: TokenKind): kind is OperandKind {
  return kind === TokenKind.IDENTIFIER || kind === TokenKind.NUMBER || kind === TokenKind.BOOLEAN;
}
