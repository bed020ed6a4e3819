import { ReportFinding, ValidationReport } from './validationReport';

function fmtLoc(f: ReportFinding): string {
  const { file, elementId } = f.location;
  return elementId ? `${file}#${elementId}` : file;
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

function pushCountTable(lines: string[], title: string, header: string, counts: Record<string, number>): void {
  lines.push(title);
  lines.push('');
  lines.push(`| ${header} | Count |`);
  lines.push(`|---|---:|`);
  const keys = Object.keys(counts).sort((a, b) => a.localeCompare(b));
  for (const k of keys) lines.push(`| ${escapeCell(k)} | ${counts[k]} |`);
  if (keys.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');
}

export function reportToMarkdown(report: ValidationReport): string {
  const lines: string[] = [];
  const errors = report.findings.filter((f) => f.severity === 'error');
  const warnings = report.findings.filter((f) => f.severity === 'warning');
  const onOff = (b: boolean) => (b ? 'on' : 'off');

  lines.push(`# OntoUML validation report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Checks: errors ${onOff(report.checks.errors)}, anti-patterns ${onOff(report.checks.antipatterns)}`);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Models scanned: **${report.modelsScanned}**`);
  lines.push(`- Models validated: **${report.modelsValidated}**`);
  lines.push(`- Findings: **${report.findings.length}** (errors: **${errors.length}**, anti-patterns: **${warnings.length}**)`);
  lines.push('');

  lines.push(`## Counts`);
  lines.push('');
  pushCountTable(lines, `### Classes by stereotype`, 'Stereotype', report.counts.classesByStereotype);
  pushCountTable(lines, `### Associations by stereotype`, 'Stereotype', report.counts.associationsByStereotype);
  pushCountTable(lines, `## Findings summary`, 'Kind', countByKind(report.findings));

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Location | Element | Message |`);
  lines.push(`|---|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const al = fmtLoc(a).localeCompare(fmtLoc(b));
    if (al !== 0) return al;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(
      `| ${f.severity} | ${f.kind} | ${escapeCell(fmtLoc(f))} | ${escapeCell(f.location.label ?? '')} | ${escapeCell(f.message)} |`,
    );
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |  |`);
  lines.push('');
  return lines.join('\n');
}
