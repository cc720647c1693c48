/** Severity classes used by extraction, ranking and rendering diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  line?: number;
}

/** Canonical diagnostic object emitted by every pipeline stage. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
  /** Flattened JSON key path, when the diagnostic concerns one document value. */
  path?: string;
}

/** Code/severity count map used in run summaries. */
export type DiagnosticHistogram = Record<string, number>;

/** Build a diagnostic code histogram from a list of diagnostics. */
export function buildCodeHistogram(diagnostics: readonly Diagnostic[]): DiagnosticHistogram {
  const histogram: DiagnosticHistogram = {};
  for (const diagnostic of diagnostics) {
    histogram[diagnostic.code] = (histogram[diagnostic.code] ?? 0) + 1;
  }
  return histogram;
}

/** Build a severity histogram from a list of diagnostics. */
export function buildSeverityHistogram(diagnostics: readonly Diagnostic[]): DiagnosticHistogram {
  const histogram: DiagnosticHistogram = {};
  for (const diagnostic of diagnostics) {
    histogram[diagnostic.severity] = (histogram[diagnostic.severity] ?? 0) + 1;
  }
  return histogram;
}

/** Format one diagnostic as a single console line. */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where: string[] = [];
  if (diagnostic.source?.name) {
    where.push(diagnostic.source.line === undefined ? diagnostic.source.name : `${diagnostic.source.name}:${diagnostic.source.line}`);
  } else if (diagnostic.source?.line !== undefined) {
    where.push(`line ${diagnostic.source.line}`);
  }
  if (diagnostic.path) {
    where.push(diagnostic.path);
  }

  const suffix = where.length > 0 ? ` (${where.join(' ')})` : '';
  return `[${diagnostic.severity}] ${diagnostic.code}: ${diagnostic.message}${suffix}`;
}
