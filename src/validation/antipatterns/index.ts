import type { ModelGraph } from '../graph';
import type { AntiPattern } from '../problems';
import { binOver } from './binOver';
import { decInt } from './decInt';
import { depPhase } from './depPhase';
import { freeRole } from './freeRole';
import { gsRig } from './gsRig';
import { hetColl } from './hetColl';
import { homoFunc } from './homoFunc';
import { mixRig } from './mixRig';
import { multDep } from './multDep';
import { relRig } from './relRig';
import { undefFormal } from './undefFormal';
import { undefPhase } from './undefPhase';
import type { AntiPatternDetector } from './types';

export type { AntiPatternDetector } from './types';

/** Detectors in reporting order. */
export const ANTI_PATTERN_DETECTORS: readonly AntiPatternDetector[] = [
  binOver,
  decInt,
  depPhase,
  freeRole,
  gsRig,
  hetColl,
  homoFunc,
  mixRig,
  multDep,
  relRig,
  undefFormal,
  undefPhase,
];

export function detectAntiPatterns(
  graph: ModelGraph,
  detectors: readonly AntiPatternDetector[] = ANTI_PATTERN_DETECTORS,
): AntiPattern[] {
  return detectors.flatMap((d) => d.detect(graph));
}
