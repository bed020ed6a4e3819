import { buildModelIndex } from '../../model/modelIndex';
import { antiPattern, relationError, validationError } from '../../validation/problems';
import { rowActivation, toHighlightCommands, toResultRows } from '../diagnosticSink';
import { assoc, cls, model } from '../../__tests__/fixtures/ontoModels';

describe('diagnosticSink', () => {
  const index = buildModelIndex(
    model(cls('r1', 'role', { name: 'Student' }), cls('k1', 'kind', { name: 'Person' }), assoc('a1', 'mediation', 'k1', 'r1')),
  );
  const problems = [
    validationError('r1', 'InvalidRole', '«role» must be connected to a «mediation»'),
    relationError('a1', 'multiplicities', 'source multiplicity is missing'),
    antiPattern('r1', 'FreeRole'),
  ];

  test('highlighting is cleared, then one command per problem', () => {
    expect(toHighlightCommands(problems)).toEqual([
      { type: 'clearHighlight' },
      { type: 'highlight', elementId: 'r1', level: 'invalid' },
      { type: 'highlight', elementId: 'a1', level: 'invalid' },
      { type: 'highlight', elementId: 'r1', level: 'warning' },
    ]);
    expect(toHighlightCommands([])).toEqual([{ type: 'clearHighlight' }]);
  });

  test('one row per problem with label and text', () => {
    const rows = toResultRows(problems, index);
    expect(rows.map(({ category, elementId, label, text }) => ({ category, elementId, label, text }))).toEqual([
      { category: 'Error', elementId: 'r1', label: 'Student', text: '«role» must be connected to a «mediation»' },
      { category: 'Error', elementId: 'a1', label: 'Person -> Student', text: 'source multiplicity is missing' },
      { category: 'Anti-Pattern', elementId: 'r1', label: 'Student', text: 'FreeRole' },
    ]);
    expect(new Set(rows.map((r) => r.key)).size).toBe(3);
    expect(rows[0].key).toMatch(/^row:[0-9a-f]{16}$/);
    expect(toResultRows(problems, index)[0].key).toBe(rows[0].key);
  });

  test('activating a row selects and pans to its element', () => {
    const [, row] = toResultRows(problems, index);
    expect(rowActivation(row)).toEqual({ type: 'selectAndPan', elementId: 'a1' });
  });
});
