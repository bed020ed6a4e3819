import { hasIntrinsicProperties } from '../graph';
import { antiPattern } from '../problems';
import type { AntiPatternDetector } from './types';

/** Undefined formal association: an end without intrinsic properties to compare. */
export const undefFormal: AntiPatternDetector = {
  kind: 'UndefFormal',
  detect: (graph) =>
    [...graph.index.associations.values()]
      .filter(
        (a) =>
          a.stereotype === 'formal' &&
          (!hasIntrinsicProperties(graph, a.source.classId) || !hasIntrinsicProperties(graph, a.target.classId)),
      )
      .map((a) => antiPattern(a.id, 'UndefFormal')),
};
