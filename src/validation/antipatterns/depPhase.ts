import { antiPattern } from '../problems';
import { countMediations } from './mediationCounts';
import type { AntiPatternDetector } from './types';

/** Relationally dependent phase: a phase taking part in a mediation. */
export const depPhase: AntiPatternDetector = {
  kind: 'DepPhase',
  detect: (graph) => {
    const counts = countMediations(graph);
    return [...counts]
      .filter(([id, n]) => n >= 1 && graph.index.classes.get(id)?.stereotype === 'phase')
      .map(([id]) => antiPattern(id, 'DepPhase'));
  },
};
