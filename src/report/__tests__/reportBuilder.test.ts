import { buildModelIndex } from '../../model/modelIndex';
import { validateModelIndex } from '../../validation/validateModel';
import { recordLoadFailure, recordModelResult } from '../reportBuilder';
import { createEmptyReport, finalizeReport, serializeReport } from '../validationReport';
import { assoc, cls, model } from '../../__tests__/fixtures/ontoModels';

describe('reportBuilder', () => {
  test('folds counts and findings from a validated model', () => {
    const report = createEmptyReport({
      toolName: 'ontouml-validate',
      toolVersion: '0.0.0',
      checks: { errors: true, antipatterns: true },
    });
    const index = buildModelIndex(
      model(cls('r1', 'role', { name: 'Student' }), cls('k1', 'kind', { name: 'Person' }), cls('x', ''), assoc('a1', '', 'k1', 'k1')),
    );
    const problems = validateModelIndex(index, { checkAntipatterns: true });
    recordModelResult(report, 'school.ontouml.json', index, problems);

    expect(report.modelsValidated).toBe(1);
    expect(report.counts.classesByStereotype).toEqual({ role: 1, kind: 1, '(none)': 1 });
    expect(report.counts.associationsByStereotype).toEqual({ '(none)': 1 });
    expect(report.findings.map((f) => f.kind)).toEqual([
      'InvalidStereotype',
      'InvalidIdentity',
      'InvalidRole',
      'BinOver',
      'FreeRole',
    ]);
    expect(report.findings[2]).toEqual({
      kind: 'InvalidRole',
      severity: 'error',
      message: '«role» must be connected to a «mediation»',
      location: { file: 'school.ontouml.json', elementId: 'r1', label: 'Student' },
    });
    expect(report.findings[3]).toEqual({
      kind: 'BinOver',
      severity: 'warning',
      message: 'Binary relation between overlapping types',
      location: { file: 'school.ontouml.json', elementId: 'a1', label: 'Person -> Person' },
    });
  });

  test('relation errors carry their aspect in the code', () => {
    const report = createEmptyReport({ toolName: 't', toolVersion: '0', checks: { errors: true, antipatterns: false } });
    const index = buildModelIndex(model(cls('k1', 'kind'), assoc('a1', '', 'k1', 'k1', ['', '1'])));
    recordModelResult(report, 'm.json', index, validateModelIndex(index));
    expect(report.findings.map((f) => f.kind)).toEqual(['InvalidRelation(Multiplicities)']);
  });

  test('load failures become document-level findings', () => {
    const report = createEmptyReport({ toolName: 't', toolVersion: '0', checks: { errors: true, antipatterns: false } });
    recordLoadFailure(report, 'broken.json', new Error('Failed to parse model JSON: broken.json'));
    expect(report.findings).toEqual([
      {
        kind: 'loadFailure',
        severity: 'error',
        message: 'Failed to parse model JSON: broken.json',
        location: { file: 'broken.json' },
      },
    ]);
    expect(report.modelsValidated).toBe(0);
  });

  test('serialized reports have sorted keys', () => {
    const report = finalizeReport(
      createEmptyReport({
        toolName: 't',
        toolVersion: '0',
        checks: { errors: true, antipatterns: false },
        startedAtIso: '2024-01-01T00:00:00.000Z',
      }),
      '2024-01-01T00:00:01.000Z',
    );
    const parsed: unknown = JSON.parse(serializeReport(report));
    expect(Object.keys(parsed instanceof Object ? parsed : {})).toEqual([
      'checks',
      'counts',
      'findings',
      'finishedAtIso',
      'modelsScanned',
      'modelsValidated',
      'schema',
      'startedAtIso',
      'tool',
    ]);
  });
});
