import { annotateClasses } from '../graph';
import { antiPattern } from '../problems';
import type { AntiPatternDetector } from './types';

/** Homogeneous functional complex: a whole with a single kind of component. */
export const homoFunc: AntiPatternDetector = {
  kind: 'HomoFunc',
  detect: (graph) => {
    const parts = annotateClasses(graph, () => 0, {
      association: (a, acc) => {
        if (a.stereotype !== 'componentOf' || a.source.classId === undefined) return;
        acc.set(a.source.classId, (acc.get(a.source.classId) ?? 0) + 1);
      },
    });
    return [...parts].filter(([, n]) => n === 1).map(([id]) => antiPattern(id, 'HomoFunc'));
  },
};
