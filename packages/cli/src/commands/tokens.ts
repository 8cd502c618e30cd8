/**
 * simplelang tokens command
 *
 * Prints the token stream the lexer produces for a source file.
 */

import { Lexer, LexerError, errorMessage, type LexedToken } from '@simplelang/grammar';
import { Command } from 'commander';
import * as fs from 'node:fs';
import { createCliContext, type CliContext } from '../context.js';
import type { Write } from '../reporter.js';

export function formatToken(token: LexedToken): string {
  const position = `${token.line}:${token.column}`.padEnd(8);
  return `${position}${token.kind.padEnd(12)}${token.value}`.trimEnd();
}

/**
 * Print one row per token and return the exit code
 */
export function runTokens(source: string, write: Write, writeError: Write): number {
  let tokens: LexedToken[];
  try {
    tokens = new Lexer().tokenize(source);
  } catch (error) {
    if (error instanceof LexerError) {
      writeError(error.message);
      return 1;
    }
    throw error;
  }

  for (const token of tokens) {
    write(formatToken(token));
  }
  return 0;
}

export const tokensCommand = new Command('tokens')
  .description('Print the tokens of a SimpleLang source file')
  .argument('<file>', 'Source file to tokenize')
  .action((file: string) => {
    let context: CliContext | undefined;
    try {
      context = createCliContext();
      const source = fs.readFileSync(file, 'utf-8');
      process.exit(runTokens(source, context.write, (line) => console.error(line)));
    } catch (error) {
      context?.logger.error('tokens_failed', { file, error });
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(2);
    }
  });
