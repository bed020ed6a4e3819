import { elementLabel, type ModelIndex } from '../model/modelIndex';
import { describeProblem, problemCode, type ValidationProblem } from '../validation/problems';
import type { ReportFinding, ValidationReport } from './validationReport';

export function addFinding(report: ValidationReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

export function incCount(map: Record<string, number>, key: string, amount = 1): void {
  map[key] = (map[key] ?? 0) + amount;
}

/**
 * Fold one validated document into the report: stereotype counts plus one
 * finding per problem, in problem order.
 */
export function recordModelResult(
  report: ValidationReport,
  file: string,
  index: ModelIndex,
  problems: ValidationProblem[],
): void {
  report.modelsValidated++;
  for (const c of index.classes.values()) {
    incCount(report.counts.classesByStereotype, c.stereotypeText === '' ? '(none)' : c.stereotypeText);
  }
  for (const a of index.associations.values()) {
    incCount(report.counts.associationsByStereotype, a.stereotypeText === '' ? '(none)' : a.stereotypeText);
  }
  for (const p of problems) {
    addFinding(report, {
      kind: problemCode(p),
      severity: p.type === 'error' ? 'error' : 'warning',
      message: describeProblem(p),
      location: { file, elementId: p.elementId, label: elementLabel(index, p.elementId) },
    });
  }
}

export function recordLoadFailure(report: ValidationReport, file: string, error: unknown): void {
  addFinding(report, {
    kind: 'loadFailure',
    severity: 'error',
    message: error instanceof Error ? error.message : String(error),
    location: { file },
  });
}
