import { annotateClasses } from '../graph';
import { antiPattern } from '../problems';
import type { AntiPatternDetector } from './types';

/** Heterogeneous collective: a collective with more than one kind of member. */
export const hetColl: AntiPatternDetector = {
  kind: 'HetColl',
  detect: (graph) => {
    const members = annotateClasses(graph, () => 0, {
      association: (a, acc) => {
        if (a.stereotype !== 'memberOf' || a.source.classId === undefined) return;
        acc.set(a.source.classId, (acc.get(a.source.classId) ?? 0) + 1);
      },
    });
    return [...members]
      .filter(([id, n]) => n > 1 && graph.index.classes.get(id)?.stereotype === 'collective')
      .map(([id]) => antiPattern(id, 'HetColl'));
  },
};
