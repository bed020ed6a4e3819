import type { AssociationNode } from '../../model/modelIndex';
import { isSortalLike } from '../../ontouml/stereotypes';
import { areDisjointDownwards, areDisjointUpwards, isSubtypeOf, stereotypeOf, type ModelGraph } from '../graph';
import { antiPattern } from '../problems';
import type { AntiPatternDetector } from './types';

/**
 * Binary relation overlap: both ends of an association may be the same
 * individual.
 */
function overlaps(graph: ModelGraph, a: AssociationNode): boolean {
  const s = a.source.classId;
  const t = a.target.classId;
  const resolves = (end: AssociationNode['source']) => end.classId !== undefined || end.isInstance;
  if (!resolves(a.source) || !resolves(a.target)) return false;
  if (a.source.elementId === a.target.elementId) return true;
  if (s === undefined || t === undefined) return false;
  if (isSubtypeOf(graph, s, t) || isSubtypeOf(graph, t, s)) return true;

  const ss = stereotypeOf(graph, s);
  const ts = stereotypeOf(graph, t);
  if (ss === undefined || ts === undefined) return false;

  if (isSortalLike(ss) && isSortalLike(ts)) return !areDisjointUpwards(graph, s, t);
  if (!isSortalLike(ss) && !isSortalLike(ts)) {
    return !(areDisjointUpwards(graph, s, t) && areDisjointDownwards(graph, s, t));
  }
  return false;
}

export const binOver: AntiPatternDetector = {
  kind: 'BinOver',
  detect: (graph) =>
    [...graph.index.associations.values()].filter((a) => overlaps(graph, a)).map((a) => antiPattern(a.id, 'BinOver')),
};
