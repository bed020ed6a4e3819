import type { ElementId } from '../model/ontoumlModel';

export type ErrorKind =
  | 'InvalidStereotype'
  | 'InvalidSubtyping'
  | 'InvalidRelation'
  | 'InvalidIdentity'
  | 'InvalidRole'
  | 'InvalidRelator'
  | 'InvalidPhase'
  | 'InvalidNonabstractMixin'
  | 'InvalidMissingCharacterization'
  | 'InvalidReference';

/** Which part of a relation an `InvalidRelation` error is about. */
export type RelationAspect = 'multiplicities' | 'endpoints';

export const ANTI_PATTERN_KINDS = [
  'BinOver',
  'DecInt',
  'DepPhase',
  'FreeRole',
  'GSRig',
  'HetColl',
  'HomoFunc',
  'MixRig',
  'MultDep',
  'RelRig',
  'UndefFormal',
  'UndefPhase',
] as const;

export type AntiPatternKind = (typeof ANTI_PATTERN_KINDS)[number];

export type ValidationError = {
  type: 'error';
  elementId: ElementId;
  kind: ErrorKind;
  message: string;
  /** Only set for `InvalidRelation`. */
  aspect?: RelationAspect;
};

export type AntiPattern = {
  type: 'antipattern';
  elementId: ElementId;
  kind: AntiPatternKind;
};

export type ValidationProblem = ValidationError | AntiPattern;

export function validationError(
  elementId: ElementId,
  kind: Exclude<ErrorKind, 'InvalidRelation'>,
  message: string,
): ValidationError {
  return { type: 'error', elementId, kind, message };
}

export function relationError(elementId: ElementId, aspect: RelationAspect, message: string): ValidationError {
  return { type: 'error', elementId, kind: 'InvalidRelation', aspect, message };
}

export function antiPattern(elementId: ElementId, kind: AntiPatternKind): AntiPattern {
  return { type: 'antipattern', elementId, kind };
}

/**
 * Opaque diagnostic code, e.g. `InvalidSubtyping`, `InvalidRelation(Multiplicities)`, `DecInt`.
 */
export function problemCode(p: ValidationProblem): string {
  if (p.type === 'antipattern') return p.kind;
  if (p.aspect) return `${p.kind}(${p.aspect.charAt(0).toUpperCase()}${p.aspect.slice(1)})`;
  return p.kind;
}

const ANTI_PATTERN_DESCRIPTIONS: Record<AntiPatternKind, string> = {
  BinOver: 'Binary relation between overlapping types',
  DecInt: 'Deceiving intersection of classifications',
  DepPhase: 'Relationally dependent phase',
  FreeRole: 'Role without a mediation',
  GSRig: 'Generalization set mixing rigid and anti-rigid types',
  HetColl: 'Heterogeneous collective',
  HomoFunc: 'Homogeneous functional complex',
  MixRig: 'Mixin with uniform rigidity',
  MultDep: 'Multiple relational dependency',
  RelRig: 'Relator mediating a rigid type',
  UndefFormal: 'Formal relation without intrinsic properties',
  UndefPhase: 'Phase partition without intrinsic properties',
};

/** Free text for a problem: the error message, or what the anti-pattern means. */
export function describeProblem(p: ValidationProblem): string {
  return p.type === 'error' ? p.message : ANTI_PATTERN_DESCRIPTIONS[p.kind];
}
