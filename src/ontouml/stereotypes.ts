/**
 * OntoUML stereotype taxonomy.
 *
 * Class and association stereotypes are closed unions; every table below is a
 * `Record` over the union so adding a stereotype fails to compile until each
 * table covers it.
 */

export const CLASS_STEREOTYPES = [
  // Sortals
  'kind',
  'subkind',
  'phase',
  'role',
  'collective',
  'quantity',
  'relator',
  // Non-sortals
  'category',
  'phaseMixin',
  'roleMixin',
  'mixin',
  // Aspects
  'mode',
  'quality',
] as const;

export type ClassStereotype = (typeof CLASS_STEREOTYPES)[number];

export const ASSOCIATION_STEREOTYPES = [
  'none',
  'formal',
  'mediation',
  'characterization',
  'structuration',
  'componentOf',
  'containment',
  'memberOf',
  'subcollectionOf',
  'subquantityOf',
] as const;

export type AssociationStereotype = (typeof ASSOCIATION_STEREOTYPES)[number];

export type Rigidity = 'rigid' | 'antiRigid' | 'semiRigid';

type StereotypeTraits = {
  rigidity: Rigidity;
  providesIdentity: boolean;
  requiresIdentity: boolean;
};

const TRAITS: Record<ClassStereotype, StereotypeTraits> = {
  kind: { rigidity: 'rigid', providesIdentity: true, requiresIdentity: true },
  subkind: { rigidity: 'rigid', providesIdentity: false, requiresIdentity: true },
  phase: { rigidity: 'antiRigid', providesIdentity: false, requiresIdentity: true },
  role: { rigidity: 'antiRigid', providesIdentity: false, requiresIdentity: true },
  collective: { rigidity: 'rigid', providesIdentity: true, requiresIdentity: true },
  quantity: { rigidity: 'rigid', providesIdentity: true, requiresIdentity: true },
  relator: { rigidity: 'rigid', providesIdentity: true, requiresIdentity: true },
  category: { rigidity: 'rigid', providesIdentity: false, requiresIdentity: false },
  phaseMixin: { rigidity: 'antiRigid', providesIdentity: false, requiresIdentity: false },
  roleMixin: { rigidity: 'antiRigid', providesIdentity: false, requiresIdentity: false },
  mixin: { rigidity: 'semiRigid', providesIdentity: false, requiresIdentity: false },
  mode: { rigidity: 'rigid', providesIdentity: true, requiresIdentity: true },
  quality: { rigidity: 'rigid', providesIdentity: true, requiresIdentity: true },
};

const ULTIMATE_AND_NON_SORTAL_PARENTS: readonly ClassStereotype[] = ['category', 'mixin'];

const SORTAL_PARENTS: readonly ClassStereotype[] = [
  'kind',
  'subkind',
  'collective',
  'quantity',
  'relator',
  'category',
  'mixin',
  'mode',
  'quality',
];

/** Legal direct parents per child stereotype. Anything not listed is illegal. */
const LEGAL_PARENTS: Record<ClassStereotype, readonly ClassStereotype[]> = {
  kind: ULTIMATE_AND_NON_SORTAL_PARENTS,
  collective: ULTIMATE_AND_NON_SORTAL_PARENTS,
  quantity: ULTIMATE_AND_NON_SORTAL_PARENTS,
  relator: ULTIMATE_AND_NON_SORTAL_PARENTS,
  quality: ULTIMATE_AND_NON_SORTAL_PARENTS,
  mode: ULTIMATE_AND_NON_SORTAL_PARENTS,
  category: ULTIMATE_AND_NON_SORTAL_PARENTS,
  mixin: ULTIMATE_AND_NON_SORTAL_PARENTS,
  subkind: SORTAL_PARENTS,
  phase: [...SORTAL_PARENTS, 'phase', 'phaseMixin'],
  role: [...SORTAL_PARENTS, 'role', 'roleMixin'],
  phaseMixin: ['mixin', 'phaseMixin', 'category'],
  roleMixin: ['mixin', 'roleMixin', 'category', 'phaseMixin'],
};

const CLASS_STEREOTYPE_SET: ReadonlySet<string> = new Set(CLASS_STEREOTYPES);
const ASSOCIATION_STEREOTYPE_SET: ReadonlySet<string> = new Set(ASSOCIATION_STEREOTYPES);

function isClassStereotype(s: string): s is ClassStereotype {
  return CLASS_STEREOTYPE_SET.has(s);
}

function isAssociationStereotype(s: string): s is AssociationStereotype {
  return ASSOCIATION_STEREOTYPE_SET.has(s);
}

/**
 * Parse a class stereotype literal. The empty string is not a class stereotype.
 */
export function parseClassStereotype(text: string): ClassStereotype | undefined {
  return isClassStereotype(text) ? text : undefined;
}

/**
 * Parse an association stereotype literal; `""` is the plain association (`none`).
 */
export function parseAssociationStereotype(text: string): AssociationStereotype | undefined {
  if (text === '') return 'none';
  return isAssociationStereotype(text) ? text : undefined;
}

export function canSpecialize(child: ClassStereotype, parent: ClassStereotype): boolean {
  return LEGAL_PARENTS[child].includes(parent);
}

export function rigidityOf(s: ClassStereotype): Rigidity {
  return TRAITS[s].rigidity;
}

export function isRigid(s: ClassStereotype): boolean {
  return TRAITS[s].rigidity === 'rigid';
}

export function isAntiRigid(s: ClassStereotype): boolean {
  return TRAITS[s].rigidity === 'antiRigid';
}

export function isIdentityProvider(s: ClassStereotype): boolean {
  return TRAITS[s].providesIdentity;
}

export function requiresIdentity(s: ClassStereotype): boolean {
  return TRAITS[s].requiresIdentity;
}

/** category, mixin, phaseMixin and roleMixin: must be abstract, never carry identity. */
export function isNonSortal(s: ClassStereotype): boolean {
  return !TRAITS[s].requiresIdentity;
}

/** Sortals, relators and aspects: the stereotypes whose extensions are compared upwards only. */
export function isSortalLike(s: ClassStereotype): boolean {
  return TRAITS[s].requiresIdentity;
}

export function isAspect(s: ClassStereotype): boolean {
  return s === 'quality' || s === 'mode';
}

/** Render as shown on a diagram, e.g. `«kind»`. */
export function guillemets(text: string): string {
  return `«${text}»`;
}
