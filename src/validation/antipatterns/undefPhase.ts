import { hasIntrinsicProperties, parentGeneralizations } from '../graph';
import { antiPattern } from '../problems';
import type { AntiPatternDetector } from './types';

/**
 * Undefined phase partition: no general of the phase carries the intrinsic
 * properties whose values would tell its phases apart.
 */
export const undefPhase: AntiPatternDetector = {
  kind: 'UndefPhase',
  detect: (graph) =>
    [...graph.index.classes.values()]
      .filter(
        (cls) =>
          cls.stereotype === 'phase' &&
          !parentGeneralizations(graph, cls.id).some((g) => g.targetIds.some((t) => hasIntrinsicProperties(graph, t))),
      )
      .map((cls) => antiPattern(cls.id, 'UndefPhase')),
};
