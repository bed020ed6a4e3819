import type {
  Aggregation,
  ElementId,
  ModelElement,
  ModelElementType,
  Navigability,
  OntoUmlModel,
} from './ontoumlModel';
import {
  parseAssociationStereotype,
  parseClassStereotype,
  type AssociationStereotype,
  type ClassStereotype,
} from '../ontouml/stereotypes';

/*
 * Flat, id-keyed view of a diagram. Packages are flattened away; edges keep
 * only ids. Maps preserve document (traversal) order.
 */

export type ClassNode = {
  id: ElementId;
  name: string;
  packageId: ElementId | null;
  /** Raw stereotype text as written in the document. */
  stereotypeText: string;
  /** Undefined when the text is not a class stereotype. */
  stereotype: ClassStereotype | undefined;
  isAbstract: boolean;
  properties: string;
  functions: string;
};

export type InstanceNode = {
  id: ElementId;
  name: string;
  packageId: ElementId | null;
  instanceType: string;
};

export type GeneralizationNode = {
  id: ElementId;
  packageId: ElementId | null;
  /** Resolved class ids only. */
  sourceIds: ElementId[];
  targetIds: ElementId[];
  setName: string;
  isDisjoint: boolean;
  isCovering: boolean;
  unresolved: UnresolvedReference[];
};

export type AssociationEndNode = {
  /** Referenced id as written in the document. */
  elementId: ElementId;
  /** Set when the end is a class. */
  classId: ElementId | undefined;
  isInstance: boolean;
  multiplicity: string;
  role: string;
  reading: string;
  navigability: Navigability;
  aggregation: Aggregation;
};

export type AssociationNode = {
  id: ElementId;
  packageId: ElementId | null;
  stereotypeText: string;
  stereotype: AssociationStereotype | undefined;
  source: AssociationEndNode;
  target: AssociationEndNode;
  unresolved: UnresolvedReference[];
};

export type UnresolvedReference = {
  role: 'source' | 'target';
  ref: ElementId;
  reason: 'missing' | 'notAClass';
};

export type IndexedElement = {
  id: ElementId;
  type: ModelElementType;
  name: string;
  packageId: ElementId | null;
};

export type ModelIndex = {
  modelId: ElementId;
  modelName: string;
  elements: IndexedElement[];
  elementsById: Map<ElementId, IndexedElement>;
  classes: Map<ElementId, ClassNode>;
  instances: Map<ElementId, InstanceNode>;
  generalizations: Map<ElementId, GeneralizationNode>;
  associations: Map<ElementId, AssociationNode>;
  /** Ids declared more than once; the first declaration wins. */
  duplicateIds: ElementId[];
};

function elementName(e: ModelElement): string {
  switch (e.type) {
    case 'package':
    case 'class':
    case 'instance':
      return e.name;
    case 'generalization':
      return e.setName ?? '';
    case 'comment':
      return e.text;
    case 'association':
    case 'dependency':
    case 'commentLink':
      return '';
  }
}

/**
 * Build the index in two passes: declare every element, then resolve the
 * references of generalizations and associations against the declarations.
 */
export function buildModelIndex(model: OntoUmlModel): ModelIndex {
  const index: ModelIndex = {
    modelId: model.id,
    modelName: model.name,
    elements: [],
    elementsById: new Map(),
    classes: new Map(),
    instances: new Map(),
    generalizations: new Map(),
    associations: new Map(),
    duplicateIds: [],
  };

  const pending: Array<{ element: ModelElement; packageId: ElementId | null }> = [];

  const declare = (elements: ModelElement[], packageId: ElementId | null) => {
    for (const e of elements) {
      if (index.elementsById.has(e.id)) {
        index.duplicateIds.push(e.id);
        continue;
      }
      const entry: IndexedElement = { id: e.id, type: e.type, name: elementName(e), packageId };
      index.elements.push(entry);
      index.elementsById.set(e.id, entry);

      if (e.type === 'package') {
        declare(e.elements, e.id);
      } else if (e.type === 'class') {
        index.classes.set(e.id, {
          id: e.id,
          name: e.name,
          packageId,
          stereotypeText: e.stereotype,
          stereotype: parseClassStereotype(e.stereotype),
          isAbstract: e.isAbstract ?? false,
          properties: e.properties ?? '',
          functions: e.functions ?? '',
        });
      } else if (e.type === 'instance') {
        index.instances.set(e.id, { id: e.id, name: e.name, packageId, instanceType: e.instanceType ?? '' });
      } else if (e.type === 'generalization' || e.type === 'association') {
        pending.push({ element: e, packageId });
      }
    }
  };
  declare(model.elements, null);

  for (const { element: e, packageId } of pending) {
    if (e.type === 'generalization') {
      const unresolved: UnresolvedReference[] = [];
      // Repeated ids on one side count once.
      const resolveClasses = (ids: ElementId[], role: UnresolvedReference['role']): ElementId[] =>
        [...new Set(ids)].filter((ref) => {
          if (index.classes.has(ref)) return true;
          unresolved.push({ role, ref, reason: index.elementsById.has(ref) ? 'notAClass' : 'missing' });
          return false;
        });
      const sourceIds = resolveClasses(e.sources, 'source');
      const targetIds = resolveClasses(e.targets, 'target');
      index.generalizations.set(e.id, {
        id: e.id,
        packageId,
        sourceIds,
        targetIds,
        setName: e.setName ?? '',
        isDisjoint: e.isDisjoint ?? false,
        isCovering: e.isCovering ?? false,
        unresolved,
      });
    } else if (e.type === 'association') {
      const unresolved: UnresolvedReference[] = [];
      const end = (role: UnresolvedReference['role']): AssociationEndNode => {
        const raw = role === 'source' ? e.source : e.target;
        const isClass = index.classes.has(raw.element);
        const isInstance = index.instances.has(raw.element);
        if (!isClass && !isInstance) {
          unresolved.push({ role, ref: raw.element, reason: index.elementsById.has(raw.element) ? 'notAClass' : 'missing' });
        }
        return {
          elementId: raw.element,
          classId: isClass ? raw.element : undefined,
          isInstance,
          multiplicity: raw.multiplicity ?? '',
          role: raw.role ?? '',
          reading: raw.reading ?? '',
          navigability: raw.navigability ?? 'unspecified',
          aggregation: raw.aggregation ?? 'none',
        };
      };
      index.associations.set(e.id, {
        id: e.id,
        packageId,
        stereotypeText: e.stereotype,
        stereotype: parseAssociationStereotype(e.stereotype),
        source: end('source'),
        target: end('target'),
        unresolved,
      });
    }
  }

  return index;
}

/**
 * Human-readable label for a results row: class name, `A -> B` for relations.
 */
export function elementLabel(index: ModelIndex, id: ElementId): string {
  const cls = index.classes.get(id);
  if (cls) return cls.name || id;
  const inst = index.instances.get(id);
  if (inst) return inst.name || id;

  const nameOf = (ref: ElementId) => {
    const e = index.elementsById.get(ref);
    return e && e.name ? e.name : ref;
  };
  const gen = index.generalizations.get(id);
  if (gen) {
    const arrow = `${gen.sourceIds.map(nameOf).join(', ')} -> ${gen.targetIds.map(nameOf).join(', ')}`;
    return gen.setName ? `${gen.setName} (${arrow})` : arrow;
  }
  const assoc = index.associations.get(id);
  if (assoc) return `${nameOf(assoc.source.elementId)} -> ${nameOf(assoc.target.elementId)}`;

  const e = index.elementsById.get(id);
  return e && e.name ? e.name : id;
}
