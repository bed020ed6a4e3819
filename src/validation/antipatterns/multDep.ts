import { associationsOf, lineageHas, oppositeEnd } from '../graph';
import { antiPattern } from '../problems';
import type { AntiPatternDetector } from './types';

/** Multiple relational dependency: mediated by more than one relator. */
export const multDep: AntiPatternDetector = {
  kind: 'MultDep',
  detect: (graph) =>
    [...graph.index.classes.values()]
      .filter((cls) => {
        const relators = new Set<string>();
        for (const a of associationsOf(graph, cls.id)) {
          if (a.stereotype !== 'mediation') continue;
          const other = oppositeEnd(a, cls.id).classId;
          if (other !== undefined && lineageHas(graph, other, (s) => s === 'relator')) relators.add(other);
        }
        return relators.size > 1;
      })
      .map((cls) => antiPattern(cls.id, 'MultDep')),
};
