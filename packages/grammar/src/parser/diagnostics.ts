/**
 * Diagnostic messages, one per failure site in the grammar
 */
export const DiagnosticMessage = {
  IDENTIFIER_IN_DECLARATION: 'Expected identifier in declaration',
  SEMICOLON_IN_DECLARATION: "Missing ';' in declaration",
  INVALID_STATEMENT: 'Invalid statement',
  ASSIGN_IN_ASSIGNMENT: "Expected '=' in assignment",
  SEMICOLON_IN_ASSIGNMENT: "Missing ';' in assignment",
  LPAREN_AFTER_IF: "Expected '(' after if",
  LPAREN_AFTER_FOR: "Expected '(' after for",
  SEMICOLON_IN_FOR: "Missing ';' in for",
  RPAREN: "Expected ')'",
  LBRACE: "Expected '{'",
  // Only reported with strictBlocks
  RBRACE: "Expected '}'",
  // Only reported with strictOperands
  OPERAND: 'Expected operand in expression',
} as const;

export type DiagnosticMessage = (typeof DiagnosticMessage)[keyof typeof DiagnosticMessage];
