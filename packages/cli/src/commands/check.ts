/**
 * simplelang check command
 *
 * Validates SimpleLang source files and pre-lexed token files, reporting the
 * first syntax error in each.
 */

import { LexerError, errorMessage, validate, type Token, type ValidateOptions } from '@simplelang/grammar';
import { Command } from 'commander';
import { glob } from 'glob';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { createCliContext, type CliContext } from '../context.js';
import { report, type CheckResult } from '../reporter.js';
import { SOURCE_EXTENSION, TOKEN_FILE_EXTENSION, TokenFileError, loadTokens } from '../sources.js';

export interface CheckOptions {
  format?: string;
  quiet?: boolean;
  color?: boolean;
  strictBlocks?: boolean;
  strictOperands?: boolean;
}

/**
 * Expand the given paths into the files to check
 *
 * Paths that do not exist are returned in `missing` rather than dropped.
 */
export async function collectFiles(paths: string[]): Promise<{ files: string[]; missing: string[] }> {
  const files: string[] = [];
  const missing: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(p);

    if (!fs.existsSync(resolved)) {
      missing.push(p);
      continue;
    }

    if (fs.statSync(resolved).isFile()) {
      files.push(resolved);
    } else {
      const found = await glob(`**/*{${SOURCE_EXTENSION},${TOKEN_FILE_EXTENSION}}`, {
        cwd: resolved,
        absolute: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      files.push(...found.sort());
    }
  }

  return { files, missing };
}

/**
 * Check a single file. Errors other than lexer and token-file errors propagate.
 */
export function checkFile(filePath: string, options: ValidateOptions = {}): CheckResult {
  const content = fs.readFileSync(filePath, 'utf-8');

  let tokens: Token[];
  try {
    tokens = loadTokens(filePath, content);
  } catch (error) {
    if (error instanceof LexerError) {
      return {
        path: filePath,
        error: { code: 'LEXER_ERROR', message: error.message, line: error.position.line },
      };
    }
    if (error instanceof TokenFileError) {
      return { path: filePath, error: { code: 'TOKEN_FILE_ERROR', message: error.message, line: null } };
    }
    throw error;
  }

  const result = validate(tokens, options);
  if (result.valid) {
    return { path: filePath, error: null };
  }

  return {
    path: filePath,
    error: { code: 'SYNTAX_ERROR', message: result.diagnostic.message, line: result.diagnostic.line },
  };
}

/**
 * Run the check and return the process exit code
 *
 * 0 when every file is accepted, 1 when any file is rejected or missing.
 */
export async function runCheck(paths: string[], options: CheckOptions, context: CliContext): Promise<number> {
  const { config, logger, write } = context;
  const format = options.format === 'json' ? 'json' : 'pretty';

  const { files, missing } = await collectFiles(paths);

  if (files.length === 0 && missing.length === 0) {
    if (format === 'json') {
      report([], { format }, write);
    } else if (!options.quiet) {
      write('No files found to check');
    }
    return 0;
  }

  const validateOptions: ValidateOptions = {
    strictBlocks: options.strictBlocks ?? config.strictBlocks ?? false,
    strictOperands: options.strictOperands ?? config.strictOperands ?? false,
  };

  logger.debug('check_started', { files: files.length, ...validateOptions });

  const results: CheckResult[] = missing.map((p): CheckResult => ({
    path: p,
    error: { code: 'PATH_NOT_FOUND', message: `Path not found: ${p}`, line: null },
  }));

  for (const file of files) {
    results.push(checkFile(file, { ...validateOptions, logger: logger.child({ file }) }));
  }

  report(results, { format, quiet: options.quiet, noColor: options.color === false }, write);

  const rejected = results.filter((r) => r.error !== null).length;
  logger.info('check_completed', { files: results.length, rejected });

  return rejected > 0 ? 1 : 0;
}

export const checkCommand = new Command('check')
  .description('Check SimpleLang sources and token files for syntax errors')
  .argument('[paths...]', 'Files or directories to check', ['.'])
  .option('--format <type>', 'Output format: pretty, json', 'pretty')
  .option('--quiet', 'Only output on errors')
  .option('--no-color', 'Disable colored output')
  .option('--strict-blocks', "Report a block cut off by the end of input as a missing '}'")
  .option('--strict-operands', 'Require identifiers, numbers or booleans as expression operands')
  .action(async (paths: string[], options: CheckOptions) => {
    let context: CliContext | undefined;
    try {
      context = createCliContext();
      process.exit(await runCheck(paths, options, context));
    } catch (error) {
      context?.logger.error('check_failed', { error });
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(2);
    }
  });
