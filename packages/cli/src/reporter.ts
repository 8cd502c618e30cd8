/**
 * Check result reporter
 */

import chalk from 'chalk';

export type DiagnosticCode = 'SYNTAX_ERROR' | 'LEXER_ERROR' | 'TOKEN_FILE_ERROR' | 'PATH_NOT_FOUND';

export interface CheckDiagnostic {
  code: DiagnosticCode;
  message: string;
  /** null when the problem has no source line, such as a missing file */
  line: number | null;
}

export interface CheckResult {
  path: string;
  error: CheckDiagnostic | null;
}

export interface ReporterOptions {
  format: 'pretty' | 'json';
  quiet?: boolean;
  noColor?: boolean;
}

export type Write = (line: string) => void;

const plain = {
  red: (s: string) => s,
  green: (s: string) => s,
  gray: (s: string) => s,
};

function plural(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? 's' : ''}`;
}

function reportPretty(results: CheckResult[], options: ReporterOptions, write: Write): void {
  const c = options.noColor ? plain : chalk;

  let rejected = 0;

  for (const result of results) {
    if (result.error) rejected++;
    if (options.quiet && !result.error) continue;

    write('');
    write(`  ${result.path}`);

    if (!result.error) {
      write(`    ${c.green('✓')} Accepted`);
      continue;
    }

    const { line, message } = result.error;
    const where = line === null ? '' : `Line ${line}: `;
    write(`    ${c.red('✗')} error  ${where}${message}`);
  }

  if (options.quiet && rejected === 0) return;

  write('');

  if (rejected === 0) {
    write(c.green(`  ✓ All ${plural(results.length, 'file')} passed`));
  } else {
    write(c.gray(`  Found ${plural(rejected, 'error')} in ${plural(results.length, 'file')}`));
  }

  write('');
}

function reportJson(results: CheckResult[], write: Write): void {
  const rejected = results.filter((r) => r.error !== null).length;

  const output = {
    files: results.map((r) => ({
      path: r.path,
      valid: r.error === null,
      error: r.error,
    })),
    summary: {
      files: results.length,
      accepted: results.length - rejected,
      rejected,
    },
  };

  write(JSON.stringify(output, null, 2));
}

/**
 * Report check results in the requested format
 */
export function report(results: CheckResult[], options: ReporterOptions, write: Write = console.log): void {
  if (options.format === 'json') {
    reportJson(results, write);
  } else {
    reportPretty(results, options, write);
  }
}
