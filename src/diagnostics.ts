/** Severity classes used by pass diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export type DiagnosticCode =
  | 'UNCLASSIFIED_EVENT'
  | 'INCOMPLETE_PITCH'
  | 'NODE_WITHOUT_ID'
  | 'MISSING_REQUIRED_STRUCTURE';

/** Reasons an element of the score was skipped by a pass */
export type SkipReason = 'unclassified-event' | 'incomplete-pitch';

export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  /** Node the diagnostic is about, when one exists */
  nodeId?: string;
}

/** Outcome of one pass over the score. */
export interface PassReport {
  pass: string;
  skipped: Record<SkipReason, number>;
  diagnostics: Diagnostic[];
}

export function createPassReport(pass: string): PassReport {
  return {
    pass,
    skipped: { 'unclassified-event': 0, 'incomplete-pitch': 0 },
    diagnostics: [],
  };
}

const SKIP_CODES: Record<SkipReason, DiagnosticCode> = {
  'unclassified-event': 'UNCLASSIFIED_EVENT',
  'incomplete-pitch': 'INCOMPLETE_PITCH',
};

/** Count a skipped element and record why. */
export function recordSkip(
  report: PassReport,
  reason: SkipReason,
  message: string,
  nodeId?: string
): void {
  report.skipped[reason] += 1;
  const diagnostic: Diagnostic = { code: SKIP_CODES[reason], severity: 'warning', message };
  if (nodeId !== undefined) diagnostic.nodeId = nodeId;
  report.diagnostics.push(diagnostic);
}

// ============================================================
// Errors
// ============================================================

/**
 * The score lacks the structure every pass needs (a part with at least one
 * measure). Raised before the pass writes anything.
 */
export class MissingStructureError extends Error {
  readonly code = 'MISSING_REQUIRED_STRUCTURE' satisfies DiagnosticCode;

  constructor(message: string) {
    super(message);
    this.name = 'MissingStructureError';
  }
}

/** A graph document that cannot be read: not an object, or no `@graph` list. */
export class GraphDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphDocumentError';
  }
}
