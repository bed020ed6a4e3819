import { buildModelIndex, elementLabel } from '../modelIndex';
import { assoc, cls, gen, model } from '../../__tests__/fixtures/ontoModels';

describe('buildModelIndex', () => {
  test('flattens packages and keeps document order', () => {
    const index = buildModelIndex(
      model(
        { type: 'package', id: 'p1', name: 'Core', elements: [cls('A', 'kind'), cls('B', 'subkind')] },
        gen('g1', ['B'], ['A']),
      ),
    );

    expect(index.elements.map((e) => e.id)).toEqual(['p1', 'A', 'B', 'g1']);
    expect(index.classes.get('A')?.packageId).toBe('p1');
    expect(index.generalizations.get('g1')?.packageId).toBeNull();
    expect(index.classes.get('B')?.stereotype).toBe('subkind');
  });

  test('applies defaults for omitted fields', () => {
    const index = buildModelIndex(
      model(cls('A', 'kind'), {
        type: 'association',
        id: 'a1',
        stereotype: '',
        source: { element: 'A' },
        target: { element: 'A' },
      }),
    );
    const a = index.classes.get('A');
    expect(a?.isAbstract).toBe(false);
    expect(a?.properties).toBe('');

    const r = index.associations.get('a1');
    expect(r?.stereotype).toBe('none');
    expect(r?.source).toEqual({
      elementId: 'A',
      classId: 'A',
      isInstance: false,
      multiplicity: '',
      role: '',
      reading: '',
      navigability: 'unspecified',
      aggregation: 'none',
    });
  });

  test('keeps unknown stereotypes as text', () => {
    const index = buildModelIndex(model(cls('A', 'event'), assoc('a1', 'material', 'A', 'A')));
    expect(index.classes.get('A')?.stereotype).toBeUndefined();
    expect(index.classes.get('A')?.stereotypeText).toBe('event');
    expect(index.associations.get('a1')?.stereotype).toBeUndefined();
  });

  test('records duplicate ids and keeps the first declaration', () => {
    const index = buildModelIndex(
      model(
        cls('A', 'kind', { name: 'First' }),
        cls('A', 'role', { name: 'Second' }),
        { type: 'package', id: 'A', name: 'Shadow', elements: [cls('Hidden', 'kind')] },
      ),
    );
    expect(index.duplicateIds).toEqual(['A', 'A']);
    expect(index.classes.get('A')?.name).toBe('First');
    expect(index.classes.has('Hidden')).toBe(false);
  });

  test('unresolved generalization references are kept apart from resolved ids', () => {
    const index = buildModelIndex(
      model(cls('A', 'kind'), { type: 'comment', id: 'n1', text: 'note' }, gen('g1', ['A', 'n1'], ['Missing'])),
    );
    const g = index.generalizations.get('g1');
    expect(g?.sourceIds).toEqual(['A']);
    expect(g?.targetIds).toEqual([]);
    expect(g?.unresolved).toEqual([
      { role: 'source', ref: 'n1', reason: 'notAClass' },
      { role: 'target', ref: 'Missing', reason: 'missing' },
    ]);
  });

  test('repeated generalization ends are kept once', () => {
    const index = buildModelIndex(
      model(cls('A', 'subkind'), cls('K', 'kind'), gen('g1', ['A', 'A'], ['K', 'K', 'Missing', 'Missing'])),
    );
    const g = index.generalizations.get('g1');
    expect(g?.sourceIds).toEqual(['A']);
    expect(g?.targetIds).toEqual(['K']);
    expect(g?.unresolved).toEqual([{ role: 'target', ref: 'Missing', reason: 'missing' }]);
  });

  test('association ends may be instances', () => {
    const index = buildModelIndex(
      model(cls('A', 'kind'), { type: 'instance', id: 'i1', name: 'alice' }, assoc('a1', '', 'A', 'i1')),
    );
    const a = index.associations.get('a1');
    expect(a?.target.isInstance).toBe(true);
    expect(a?.target.classId).toBeUndefined();
    expect(a?.unresolved).toEqual([]);
  });
});

describe('elementLabel', () => {
  const index = buildModelIndex(
    model(
      cls('p', 'kind', { name: 'Person' }),
      cls('m', 'subkind', { name: 'Man' }),
      cls('w', 'subkind', { name: 'Woman' }),
      cls('x', 'kind', { name: '' }),
      gen('g1', ['m', 'w'], ['p']),
      gen('g2', ['m'], ['p'], { setName: 'gender' }),
      assoc('a1', 'mediation', 'p', 'm'),
    ),
  );

  test('classes use their name, falling back to the id', () => {
    expect(elementLabel(index, 'p')).toBe('Person');
    expect(elementLabel(index, 'x')).toBe('x');
  });

  test('relations render as arrows', () => {
    expect(elementLabel(index, 'g1')).toBe('Man, Woman -> Person');
    expect(elementLabel(index, 'g2')).toBe('gender (Man -> Person)');
    expect(elementLabel(index, 'a1')).toBe('Person -> Man');
  });

  test('unknown ids label as themselves', () => {
    expect(elementLabel(index, 'nope')).toBe('nope');
  });
});
