import type { ModelGraph } from '../graph';
import type { AntiPattern, AntiPatternKind } from '../problems';

/**
 * An anti-pattern detector: one focused, read-only pass over the graph that
 * returns its findings in traversal order.
 */
export type AntiPatternDetector = {
  kind: AntiPatternKind;
  detect: (graph: ModelGraph) => AntiPattern[];
};
