/**
 * Outcome of a grammar production
 *
 * Productions never throw. A failed production returns its diagnostic and
 * every caller passes it straight up without reading another token.
 */

export interface SyntaxDiagnostic {
  /** Fixed message for the failing check, see DiagnosticMessage */
  readonly message: string;
  /** Line of the token that was current when the check failed */
  readonly line: number;
}

export type Result = { readonly ok: true } | { readonly ok: false; readonly diagnostic: SyntaxDiagnostic };

export const OK: Result = { ok: true };

export function failure(message: string, line: number): Result {
  return { ok: false, diagnostic: { message, line } };
}
