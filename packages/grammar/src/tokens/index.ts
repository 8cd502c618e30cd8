export {
  TOKEN_KINDS,
  TokenKind,
  isBinaryOperator,
  isOperand,
  isTokenKind,
  isTypeKeyword,
} from './token-kinds.js';
export type { BinaryOperator, OperandKind, TypeKeyword } from './token-kinds.js';
export { token, tokensFrom } from './token.js';
export type { Token, TokenPair } from './token.js';
