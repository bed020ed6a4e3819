import { stableStringify } from '../util/deterministicJson';

export type ReportSeverity = 'warning' | 'error';

export type ReportLocation = {
  /** Model document path as given on the command line (or `<memory>`). */
  file: string;
  /** Offending element; absent for document-level findings. */
  elementId?: string;
  /** Element label as shown in the results table. */
  label?: string;
};

export type ReportFinding = {
  /** Diagnostic code, e.g. `InvalidSubtyping` or `HetColl`; `loadFailure` for unreadable documents. */
  kind: string;
  severity: ReportSeverity;
  message: string;
  location: ReportLocation;
};

export type ValidationReport = {
  schema: 'ontouml-validation-report-v1';
  tool: { name: string; version: string };
  checks: { errors: boolean; antipatterns: boolean };
  startedAtIso: string;
  finishedAtIso: string;
  modelsScanned: number;
  modelsValidated: number;
  counts: {
    classesByStereotype: Record<string, number>;
    associationsByStereotype: Record<string, number>;
  };
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  checks: { errors: boolean; antipatterns: boolean };
  startedAtIso?: string;
}): ValidationReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'ontouml-validation-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    checks: { ...args.checks },
    startedAtIso: now,
    finishedAtIso: now,
    modelsScanned: 0,
    modelsValidated: 0,
    counts: { classesByStereotype: {}, associationsByStereotype: {} },
    findings: [],
  };
}

export function finalizeReport(report: ValidationReport, finishedAtIso?: string): ValidationReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: ValidationReport): string {
  // Keep it deterministic for tests and CI diffs.
  return stableStringify(report);
}
