import { antiPattern } from '../problems';
import { countMediations } from './mediationCounts';
import type { AntiPatternDetector } from './types';

/** Free role: a role with no mediation of its own. */
export const freeRole: AntiPatternDetector = {
  kind: 'FreeRole',
  detect: (graph) => {
    const counts = countMediations(graph);
    return [...counts]
      .filter(([id, n]) => n === 0 && graph.index.classes.get(id)?.stereotype === 'role')
      .map(([id]) => antiPattern(id, 'FreeRole'));
  },
};
