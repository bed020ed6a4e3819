import { isAntiRigid, isRigid } from '../../ontouml/stereotypes';
import { stereotypeOf } from '../graph';
import { antiPattern } from '../problems';
import type { AntiPatternDetector } from './types';

/** Generalization set mixing rigid and anti-rigid specifics. */
export const gsRig: AntiPatternDetector = {
  kind: 'GSRig',
  detect: (graph) =>
    [...graph.index.generalizations.values()]
      .filter((g) => {
        const stereotypes = g.sourceIds.map((s) => stereotypeOf(graph, s));
        const rigid = stereotypes.some((s) => s !== undefined && isRigid(s));
        const antiRigid = stereotypes.some((s) => s !== undefined && isAntiRigid(s));
        return rigid && antiRigid;
      })
      .map((g) => antiPattern(g.id, 'GSRig')),
};
