import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { loadModelFile, parseModelDocument, parseModelJson } from '../loadModel';
import { createEmptyModel } from '../ontoumlModel';

const validDoc = {
  schemaVersion: '1.0',
  id: 'm1',
  name: 'Agency',
  elements: [
    {
      type: 'package',
      id: 'p1',
      name: 'People',
      elements: [
        { type: 'class', id: 'c1', name: 'Person', stereotype: 'kind' },
        { type: 'class', id: 'c2', name: 'Employee', stereotype: 'role', properties: '+ badge: int' },
      ],
    },
    { type: 'generalization', id: 'g1', sources: ['c2'], targets: ['c1'] },
    {
      type: 'association',
      id: 'a1',
      stereotype: '',
      source: { element: 'c1', multiplicity: '1' },
      target: { element: 'c2', multiplicity: '0..*', navigability: 'navigable' },
    },
    { type: 'comment', id: 'n1', text: 'hello' },
    { type: 'commentLink', id: 'l1', source: 'n1', target: 'c1' },
  ],
};

describe('model schema', () => {
  test('accepts a well-formed document', () => {
    expect(parseModelDocument(validDoc).name).toBe('Agency');
    expect(parseModelDocument(createEmptyModel()).elements).toEqual([]);
  });

  test('rejects a class without a stereotype field', () => {
    const doc = { ...validDoc, elements: [{ type: 'class', id: 'c1', name: 'Person' }] };
    expect(() => parseModelDocument(doc, 'm.json')).toThrow(/Invalid OntoUML model document: m\.json/);
    expect(() => parseModelDocument(doc, 'm.json')).toThrow(/must have required property 'stereotype'/);
  });

  test('rejects unknown element types and extra properties', () => {
    expect(() => parseModelDocument({ ...validDoc, elements: [{ type: 'note', id: 'x' }] })).toThrow(
      /Invalid OntoUML model document/,
    );
    expect(() => parseModelDocument({ ...validDoc, color: 'red' })).toThrow(/must NOT have additional properties/);
  });

  test('rejects an empty generalization', () => {
    const doc = { ...validDoc, elements: [{ type: 'generalization', id: 'g', sources: [], targets: ['c1'] }] };
    expect(() => parseModelDocument(doc)).toThrow(/\/elements\/0\/sources/);
  });

  test('rejects a wrong schema version', () => {
    expect(() => parseModelDocument({ ...validDoc, schemaVersion: '2.0' })).toThrow(/\/schemaVersion/);
  });

  test('reports malformed JSON with its origin', () => {
    expect(() => parseModelJson('{ nope', 'broken.json')).toThrow(/^Failed to parse model JSON: broken\.json/);
  });
});

describe('loadModelFile', () => {
  test('reads a document from disk', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ouv-load-'));
    const file = path.join(dir, 'agency.ontouml.json');
    await fs.writeFile(file, JSON.stringify(validDoc), 'utf8');

    const m = await loadModelFile(file);
    expect(m.id).toBe('m1');
    expect(m.elements).toHaveLength(5);
  });

  test('missing files fail with a read error', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ouv-load-'));
    await expect(loadModelFile(path.join(dir, 'absent.json'))).rejects.toThrow(/^Failed to read model: /);
  });
});
