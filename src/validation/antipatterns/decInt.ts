import { annotateClasses } from '../graph';
import { antiPattern } from '../problems';
import type { AntiPatternDetector } from './types';

/**
 * Deceiving intersection: a class classified along more than one effective
 * axis. A disjoint generalization weighs 1; any other weighs the number of its
 * concrete targets.
 */
export const decInt: AntiPatternDetector = {
  kind: 'DecInt',
  detect: (graph) => {
    const weights = annotateClasses(graph, () => 0, {
      generalization: (g, acc) => {
        const weight = g.isDisjoint
          ? 1
          : g.targetIds.filter((t) => graph.index.classes.get(t)?.isAbstract === false).length;
        for (const s of g.sourceIds) acc.set(s, (acc.get(s) ?? 0) + weight);
      },
    });
    return [...weights].filter(([, w]) => w > 1).map(([id]) => antiPattern(id, 'DecInt'));
  },
};
