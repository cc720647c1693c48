import type { Diagnostic, DiagnosticSeverity, DiagnosticSource } from '../core/diagnostics.js';

/** Supported extraction strictness modes. */
export type ExtractMode = 'strict' | 'lenient';

/** Mutable run state shared by extraction, ranking and rendering passes. */
export interface ExtractContext {
  mode: ExtractMode;
  sourceName?: string;
  diagnostics: Diagnostic[];
  validationFailure: boolean;
}

/** Create a context for one pipeline invocation. */
export function createExtractContext(mode: ExtractMode = 'lenient', sourceName?: string): ExtractContext {
  return {
    mode,
    sourceName,
    diagnostics: [],
    validationFailure: false
  };
}

/**
 * Record a diagnostic entry, escalating warnings to errors in strict mode.
 * Every stage goes through here so strict runs fail the same way everywhere.
 */
export function addDiagnostic(
  ctx: ExtractContext,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  source?: DiagnosticSource,
  path?: string
): void {
  let actualSeverity = severity;
  if (ctx.mode === 'strict' && severity === 'warning') {
    actualSeverity = 'error';
  }

  if (actualSeverity === 'error') {
    ctx.validationFailure = true;
  }

  const diagnostic: Diagnostic = { code, severity: actualSeverity, message };
  const name = source?.name ?? ctx.sourceName;
  if (name !== undefined || source?.line !== undefined) {
    diagnostic.source = { name, line: source?.line };
  }
  if (path !== undefined) {
    diagnostic.path = path;
  }
  ctx.diagnostics.push(diagnostic);
}
