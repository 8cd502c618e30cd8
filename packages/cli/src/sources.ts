/**
 * Loading token sequences from files
 *
 * `.sl` files are SimpleLang source and go through the lexer. `.tokens.json`
 * files hold an already-lexed sequence, either as `[kind, line]` pairs or as
 * `{ "kind": ..., "line": ... }` objects.
 */

import { Lexer, isTokenKind, token, type Token } from '@simplelang/grammar';
import { z } from 'zod';

export const SOURCE_EXTENSION = '.sl';
export const TOKEN_FILE_EXTENSION = '.tokens.json';

export type SourceFileType = 'source' | 'tokens' | 'unknown';

/**
 * Thrown when a token file is not valid JSON or does not match the schema
 */
export class TokenFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenFileError';
  }
}

const tokenKindSchema = z.string().refine(isTokenKind, { message: 'Unknown token kind' });

const lineSchema = z.number().int().min(1);

const tokenSchema = z.union([
  z.tuple([tokenKindSchema, lineSchema]).transform(([kind, line]) => token(kind, line)),
  z.object({ kind: tokenKindSchema, line: lineSchema }).transform(({ kind, line }) => token(kind, line)),
]);

export const tokenFileSchema = z.array(tokenSchema);

export function getSourceFileType(filePath: string): SourceFileType {
  if (filePath.endsWith(TOKEN_FILE_EXTENSION)) return 'tokens';
  if (filePath.endsWith(SOURCE_EXTENSION)) return 'source';
  return 'unknown';
}

/**
 * Parse the contents of a token file
 *
 * @throws {TokenFileError} If the content is not a valid token list
 */
export function parseTokenFile(content: string): Token[] {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new TokenFileError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = tokenFileSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new TokenFileError(`Invalid token file${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

/**
 * Turn file contents into a token sequence according to the file type
 *
 * @throws {LexerError} For source files with characters SimpleLang has no token for
 * @throws {TokenFileError} For malformed token files or unknown file types
 */
export function loadTokens(filePath: string, content: string): Token[] {
  switch (getSourceFileType(filePath)) {
    case 'source':
      return new Lexer().tokenize(content);
    case 'tokens':
      return parseTokenFile(content);
    case 'unknown':
      throw new TokenFileError(
        `Unknown file type: expected ${SOURCE_EXTENSION} or ${TOKEN_FILE_EXTENSION}`,
      );
  }
}
