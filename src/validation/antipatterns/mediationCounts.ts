import type { ElementId } from '../../model/ontoumlModel';
import { annotateClasses, type ModelGraph } from '../graph';

/** Number of `mediation` associations each class takes part in. */
export function countMediations(graph: ModelGraph): Map<ElementId, number> {
  return annotateClasses(graph, () => 0, {
    association: (a, acc) => {
      if (a.stereotype !== 'mediation') return;
      const ends = new Set([a.source.classId, a.target.classId]);
      for (const id of ends) {
        if (id !== undefined) acc.set(id, (acc.get(id) ?? 0) + 1);
      }
    },
  });
}
