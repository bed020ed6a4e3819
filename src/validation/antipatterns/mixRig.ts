import { isAntiRigid, isRigid } from '../../ontouml/stereotypes';
import { annotateClasses, stereotypeOf } from '../graph';
import { antiPattern } from '../problems';
import type { AntiPatternDetector } from './types';

type Children = { rigid: number; antiRigid: number };

/**
 * Mixin with uniform rigidity: all direct specifics are rigid, or all are
 * anti-rigid, so a category or a role mixin fits better.
 */
export const mixRig: AntiPatternDetector = {
  kind: 'MixRig',
  detect: (graph) => {
    const children = annotateClasses<Children>(graph, () => ({ rigid: 0, antiRigid: 0 }), {
      generalization: (g, acc) => {
        for (const t of g.targetIds) {
          const entry = acc.get(t);
          if (!entry || stereotypeOf(graph, t) !== 'mixin') continue;
          for (const s of g.sourceIds) {
            const st = stereotypeOf(graph, s);
            if (st === undefined) continue;
            if (isRigid(st)) entry.rigid++;
            else if (isAntiRigid(st)) entry.antiRigid++;
          }
        }
      },
    });
    return [...children]
      .filter(([id, c]) => stereotypeOf(graph, id) === 'mixin' && (c.rigid > 0) !== (c.antiRigid > 0))
      .map(([id]) => antiPattern(id, 'MixRig'));
  },
};
