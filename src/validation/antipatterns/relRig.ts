import { isRigid } from '../../ontouml/stereotypes';
import { associationsOf, lineageHas, oppositeEnd, stereotypeOf } from '../graph';
import { antiPattern } from '../problems';
import type { AntiPatternDetector } from './types';

/** Relator mediating a rigid type. */
export const relRig: AntiPatternDetector = {
  kind: 'RelRig',
  detect: (graph) =>
    [...graph.index.classes.values()]
      .filter(
        (cls) =>
          lineageHas(graph, cls.id, (s) => s === 'relator') &&
          associationsOf(graph, cls.id).some((a) => {
            if (a.stereotype !== 'mediation') return false;
            const other = stereotypeOf(graph, oppositeEnd(a, cls.id).classId);
            return other !== undefined && isRigid(other);
          }),
      )
      .map((cls) => antiPattern(cls.id, 'RelRig')),
};
