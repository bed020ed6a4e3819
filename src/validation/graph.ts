import type { ElementId } from '../model/ontoumlModel';
import type { AssociationNode, ClassNode, GeneralizationNode, ModelIndex } from '../model/modelIndex';
import type { ClassStereotype } from '../ontouml/stereotypes';

/**
 * Incidence tables over a model index. Built once per validation run; every
 * query below is read-only.
 */
export type ModelGraph = {
  index: ModelIndex;
  /** Generalizations listing the class among their sources. */
  parents: Map<ElementId, GeneralizationNode[]>;
  /** Generalizations listing the class among their targets. */
  children: Map<ElementId, GeneralizationNode[]>;
  /** Associations with the class at either end (a self-association appears once). */
  associations: Map<ElementId, AssociationNode[]>;
};

const NONE: readonly never[] = [];

function push<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    if (!list.includes(value)) list.push(value);
  } else {
    map.set(key, [value]);
  }
}

export function buildModelGraph(index: ModelIndex): ModelGraph {
  const graph: ModelGraph = { index, parents: new Map(), children: new Map(), associations: new Map() };
  for (const g of index.generalizations.values()) {
    for (const s of g.sourceIds) push(graph.parents, s, g);
    for (const t of g.targetIds) push(graph.children, t, g);
  }
  for (const a of index.associations.values()) {
    if (a.source.classId) push(graph.associations, a.source.classId, a);
    if (a.target.classId) push(graph.associations, a.target.classId, a);
  }
  return graph;
}

export function parentGeneralizations(graph: ModelGraph, id: ElementId): readonly GeneralizationNode[] {
  return graph.parents.get(id) ?? NONE;
}

export function childGeneralizations(graph: ModelGraph, id: ElementId): readonly GeneralizationNode[] {
  return graph.children.get(id) ?? NONE;
}

export function associationsOf(graph: ModelGraph, id: ElementId): readonly AssociationNode[] {
  return graph.associations.get(id) ?? NONE;
}

export function stereotypeOf(graph: ModelGraph, id: ElementId | undefined): ClassStereotype | undefined {
  return id === undefined ? undefined : graph.index.classes.get(id)?.stereotype;
}

/**
 * The class at the other end of `a` as seen from `id`. For a self-association
 * this is `id` itself.
 */
export function oppositeEnd(a: AssociationNode, id: ElementId): AssociationNode['source'] {
  return a.source.classId === id ? a.target : a.source;
}

/**
 * True when `a` reaches `b` through one or more generalization edges.
 *
 * `seen` collects every class already expanded during this query, so each
 * class is expanded at most once.
 */
export function isSubtypeOf(
  graph: ModelGraph,
  a: ElementId,
  b: ElementId,
  seen: Set<ElementId> = new Set(),
): boolean {
  if (seen.has(a)) return false;
  seen.add(a);
  for (const g of parentGeneralizations(graph, a)) {
    for (const t of g.targetIds) {
      if (t === b) return true;
      if (isSubtypeOf(graph, t, b, seen)) return true;
    }
  }
  return false;
}

function isSelfOrSubtypeOf(graph: ModelGraph, a: ElementId, b: ElementId): boolean {
  return a === b || isSubtypeOf(graph, a, b);
}

/** Breadth-first closure over one direction of the hierarchy, starting with `start`. */
function closureInOrder(
  start: ElementId,
  next: (id: ElementId) => Iterable<ElementId>,
): ElementId[] {
  const seen = new Set<ElementId>([start]);
  const order: ElementId[] = [start];
  for (let i = 0; i < order.length; i++) {
    for (const n of next(order[i])) {
      if (seen.has(n)) continue;
      seen.add(n);
      order.push(n);
    }
  }
  return order;
}

function directParents(graph: ModelGraph, id: ElementId): ElementId[] {
  return parentGeneralizations(graph, id).flatMap((g) => g.targetIds);
}

function directChildren(graph: ModelGraph, id: ElementId): ElementId[] {
  return childGeneralizations(graph, id).flatMap((g) => g.sourceIds);
}

/** Ancestors, nearest first, without `id` itself. */
export function ancestorsOf(graph: ModelGraph, id: ElementId): ElementId[] {
  return closureInOrder(id, (n) => directParents(graph, n)).slice(1);
}

export function descendantsOf(graph: ModelGraph, id: ElementId): ElementId[] {
  return closureInOrder(id, (n) => directChildren(graph, n)).slice(1);
}

/**
 * Nearest element among `a` and its ancestors that is `b` or an ancestor of `b`.
 */
export function leastUpperBound(graph: ModelGraph, a: ElementId, b: ElementId): ElementId | undefined {
  return closureInOrder(a, (n) => directParents(graph, n)).find((c) => isSelfOrSubtypeOf(graph, b, c));
}

/**
 * Nearest element among `b` and its descendants that is `a` or a descendant of `a`.
 */
export function greatestLowerBound(graph: ModelGraph, a: ElementId, b: ElementId): ElementId | undefined {
  return closureInOrder(b, (n) => directChildren(graph, n)).find((c) => isSelfOrSubtypeOf(graph, c, a));
}

/**
 * True when `a` and `b` have no common supertype, or when a disjoint
 * generalization at their least upper bound puts them in different branches.
 */
export function areDisjointUpwards(graph: ModelGraph, a: ElementId, b: ElementId): boolean {
  if (a === b) return false;
  const bound = leastUpperBound(graph, a, b);
  if (bound === undefined) return true;
  if (bound === a || bound === b) return false;

  for (const g of childGeneralizations(graph, bound)) {
    if (!g.isDisjoint) continue;
    const ba = g.sourceIds.find((s) => isSelfOrSubtypeOf(graph, a, s));
    const bb = g.sourceIds.find((s) => isSelfOrSubtypeOf(graph, b, s));
    if (ba !== undefined && bb !== undefined && ba !== bb) return true;
  }
  return false;
}

/**
 * Mirror of {@link areDisjointUpwards} over common subtypes: true when there is
 * none, or when a disjoint generalization at the greatest lower bound leads to
 * `a` and `b` through different targets.
 */
export function areDisjointDownwards(graph: ModelGraph, a: ElementId, b: ElementId): boolean {
  if (a === b) return false;
  const bound = greatestLowerBound(graph, a, b);
  if (bound === undefined) return true;
  if (bound === a || bound === b) return false;

  for (const g of parentGeneralizations(graph, bound)) {
    if (!g.isDisjoint) continue;
    const ba = g.targetIds.find((t) => isSelfOrSubtypeOf(graph, t, a));
    const bb = g.targetIds.find((t) => isSelfOrSubtypeOf(graph, t, b));
    if (ba !== undefined && bb !== undefined && ba !== bb) return true;
  }
  return false;
}

/**
 * True when the class or one of its ancestors has a stereotype accepted by `test`.
 */
export function lineageHas(
  graph: ModelGraph,
  id: ElementId | undefined,
  test: (s: ClassStereotype) => boolean,
): boolean {
  if (id === undefined) return false;
  return closureInOrder(id, (n) => directParents(graph, n)).some((c) => {
    const s = stereotypeOf(graph, c);
    return s !== undefined && test(s);
  });
}

function hasOwnIntrinsicProperties(graph: ModelGraph, cls: ClassNode): boolean {
  if (cls.properties.trim() !== '') return true;
  return associationsOf(graph, cls.id).some((a) => a.stereotype === 'characterization' && a.source.classId === cls.id);
}

/**
 * Own non-empty attribute text, a characterized quality or mode, or an
 * ancestor with either.
 */
export function hasIntrinsicProperties(
  graph: ModelGraph,
  id: ElementId | undefined,
  seen: Set<ElementId> = new Set(),
): boolean {
  if (id === undefined || seen.has(id)) return false;
  const cls = graph.index.classes.get(id);
  if (!cls) return false;
  if (hasOwnIntrinsicProperties(graph, cls)) return true;

  seen.add(id);
  return directParents(graph, id).some((p) => hasIntrinsicProperties(graph, p, seen));
}

/**
 * One pass over the model that seeds an annotation per class and folds every
 * generalization and association into the annotations through `visit`.
 * Annotations come back in class traversal order.
 */
export function annotateClasses<T>(
  graph: ModelGraph,
  init: (cls: ClassNode) => T,
  visit: {
    generalization?: (g: GeneralizationNode, annotations: Map<ElementId, T>) => void;
    association?: (a: AssociationNode, annotations: Map<ElementId, T>) => void;
  },
): Map<ElementId, T> {
  const annotations = new Map<ElementId, T>();
  for (const cls of graph.index.classes.values()) annotations.set(cls.id, init(cls));
  if (visit.generalization) {
    for (const g of graph.index.generalizations.values()) visit.generalization(g, annotations);
  }
  if (visit.association) {
    for (const a of graph.index.associations.values()) visit.association(a, annotations);
  }
  return annotations;
}
