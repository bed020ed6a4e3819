import type { ElementId } from '../model/ontoumlModel';
import type {
  AssociationEndNode,
  AssociationNode,
  ClassNode,
  GeneralizationNode,
  UnresolvedReference,
} from '../model/modelIndex';
import {
  canSpecialize,
  guillemets,
  isAspect,
  isIdentityProvider,
  isNonSortal,
  requiresIdentity,
  type ClassStereotype,
} from '../ontouml/stereotypes';
import {
  formatMultiplicity,
  isConsistent,
  isExactlyOne,
  parseMultiplicity,
  type Multiplicity,
} from '../ontouml/multiplicity';
import { isSubtypeOf, lineageHas, parentGeneralizations, stereotypeOf, type ModelGraph } from './graph';
import { relationError, validationError, type ValidationProblem } from './problems';

type IdentityInterval = { min: number; max: number };

/** Per-class aggregate filled by the element pass and read by the class pass. */
type ClassInfo = {
  identity: IdentityInterval;
  /** Sum of the opposite ends' lower bounds over the class's own mediations. */
  mediationLower: number;
  characterized: boolean;
  inDisjointCompleteSet: boolean;
};

type EndRole = 'source' | 'target';

function seedInfo(cls: ClassNode): ClassInfo {
  const provides = cls.stereotype !== undefined && isIdentityProvider(cls.stereotype);
  return {
    identity: provides ? { min: 1, max: 1 } : { min: 0, max: 0 },
    mediationLower: 0,
    characterized: false,
    inDisjointCompleteSet: false,
  };
}

function describeUnresolved(kind: 'generalization' | 'association', u: UnresolvedReference): string {
  const what = u.reason === 'missing' ? 'does not exist' : kind === 'generalization' ? 'is not a class' : 'is not a classifier';
  return `${kind} ${u.role} '${u.ref}' ${what}`;
}

/**
 * Identity weight a generalization contributes to each of its sources.
 */
function identityWeight(graph: ModelGraph, g: GeneralizationNode): IdentityInterval {
  const n = g.targetIds.length;
  const providers = g.targetIds.filter((t) => {
    const s = stereotypeOf(graph, t);
    return s !== undefined && (isIdentityProvider(s) || requiresIdentity(s));
  }).length;

  if (g.isDisjoint || (g.sourceIds.length === 1 && n === 1)) {
    return { min: n > 0 && providers === n ? 1 : 0, max: Math.min(providers, 1) };
  }
  if (g.isCovering) {
    return { min: Math.min(providers, 1), max: providers };
  }
  return { min: 0, max: providers + 1 };
}

function formatInterval(i: IdentityInterval): string {
  return i.min === i.max ? String(i.min) : `${i.min}..${i.max}`;
}

/**
 * Well-formedness rules: stereotypes, subtyping, identity, relation shapes and
 * the per-stereotype class rules.
 */
export function validateStructure(graph: ModelGraph): ValidationProblem[] {
  const { index } = graph;
  const problems: ValidationProblem[] = [];

  const infos = new Map<ElementId, ClassInfo>();
  for (const cls of index.classes.values()) infos.set(cls.id, seedInfo(cls));

  const checkClass = (cls: ClassNode) => {
    if (cls.stereotype !== undefined) return;
    const text = cls.stereotypeText === '' ? 'class has no stereotype' : `unknown class stereotype ${guillemets(cls.stereotypeText)}`;
    problems.push(validationError(cls.id, 'InvalidStereotype', text));
  };

  const checkGeneralization = (g: GeneralizationNode) => {
    for (const u of g.unresolved) {
      problems.push(validationError(g.id, 'InvalidReference', describeUnresolved('generalization', u)));
    }

    const weight = identityWeight(graph, g);
    for (const s of g.sourceIds) {
      const info = infos.get(s);
      if (info) {
        info.identity.min += weight.min;
        info.identity.max += weight.max;
        if (g.isDisjoint && g.isCovering) info.inDisjointCompleteSet = true;
      }

      const ss = stereotypeOf(graph, s);
      for (const t of g.targetIds) {
        const ts = stereotypeOf(graph, t);
        if (ss === undefined || ts === undefined) continue;
        if (!canSpecialize(ss, ts)) {
          problems.push(
            validationError(g.id, 'InvalidSubtyping', `${guillemets(ss)} cannot be subtype of ${guillemets(ts)}`),
          );
        }
      }
    }
  };

  const checkAssociation = (a: AssociationNode) => {
    for (const u of a.unresolved) {
      problems.push(validationError(a.id, 'InvalidReference', describeUnresolved('association', u)));
    }

    if (a.stereotype === undefined) {
      problems.push(
        validationError(a.id, 'InvalidStereotype', `unknown association stereotype ${guillemets(a.stereotypeText)}`),
      );
    }

    const parseEnd = (role: EndRole, end: AssociationEndNode): Multiplicity | undefined => {
      const parsed = parseMultiplicity(end.multiplicity);
      if (!parsed.ok) {
        problems.push(
          relationError(
            a.id,
            'multiplicities',
            parsed.reason === 'absent'
              ? `${role} multiplicity is missing`
              : `${role} multiplicity '${end.multiplicity}' is not a valid range`,
          ),
        );
        return undefined;
      }
      if (!isConsistent(parsed.value)) {
        problems.push(
          relationError(a.id, 'multiplicities', `${role} multiplicity '${end.multiplicity}' has upper bound below lower bound`),
        );
        return undefined;
      }
      return parsed.value;
    };
    const sourceMult = parseEnd('source', a.source);
    const targetMult = parseEnd('target', a.target);

    if (a.stereotype === undefined) return;
    const st = guillemets(a.stereotype);
    const multOf = (role: EndRole) => (role === 'source' ? sourceMult : targetMult);
    const endOf = (role: EndRole) => (role === 'source' ? a.source : a.target);

    const lowerAtLeastOne = (role: EndRole) => {
      const m = multOf(role);
      if (m && m.lower < 1) {
        problems.push(
          relationError(a.id, 'multiplicities', `${role} multiplicity of ${st} must have a lower bound of at least 1 (found ${formatMultiplicity(m)})`),
        );
      }
    };
    const exactlyOne = (role: EndRole) => {
      const m = multOf(role);
      if (m && !isExactlyOne(m)) {
        problems.push(
          relationError(a.id, 'multiplicities', `${role} multiplicity of ${st} must be 1..1 (found ${formatMultiplicity(m)})`),
        );
      }
    };
    const endMust = (role: EndRole, expectation: string, ok: (classId: ElementId) => boolean) => {
      const end = endOf(role);
      // Dangling ends were already reported above.
      if (end.classId === undefined && !end.isInstance) return;
      if (end.classId !== undefined && ok(end.classId)) return;
      problems.push(relationError(a.id, 'endpoints', `${role} of ${st} must be ${expectation}`));
    };
    const directly = (...allowed: ClassStereotype[]) => (id: ElementId) => {
      const s = stereotypeOf(graph, id);
      return s !== undefined && allowed.includes(s);
    };
    const byLineage = (...allowed: ClassStereotype[]) => (id: ElementId) =>
      lineageHas(graph, id, (s) => allowed.includes(s));
    const notByLineage = (...excluded: ClassStereotype[]) => (id: ElementId) =>
      !lineageHas(graph, id, (s) => excluded.includes(s));

    switch (a.stereotype) {
      case 'none':
      case 'formal':
        break;
      case 'mediation': {
        lowerAtLeastOne('source');
        lowerAtLeastOne('target');
        const sourceInfo = a.source.classId === undefined ? undefined : infos.get(a.source.classId);
        const targetInfo = a.target.classId === undefined ? undefined : infos.get(a.target.classId);
        if (sourceInfo && targetMult) sourceInfo.mediationLower += targetMult.lower;
        if (targetInfo && sourceMult) targetInfo.mediationLower += sourceMult.lower;
        break;
      }
      case 'characterization': {
        exactlyOne('source');
        lowerAtLeastOne('target');
        endMust('target', 'a «quality» or «mode»', directly('quality', 'mode'));
        const targetInfo = a.target.classId === undefined ? undefined : infos.get(a.target.classId);
        if (targetInfo) targetInfo.characterized = true;
        break;
      }
      case 'structuration':
        exactlyOne('target');
        endMust('source', 'a «quality»', directly('quality'));
        endMust('target', 'a «quality» or «mode»', directly('quality', 'mode'));
        break;
      case 'componentOf':
        lowerAtLeastOne('target');
        endMust('source', 'a functional complex', notByLineage('collective', 'quantity'));
        endMust('target', 'a functional complex', notByLineage('collective', 'quantity'));
        break;
      case 'memberOf':
        lowerAtLeastOne('target');
        endMust('source', 'a «collective»', byLineage('collective'));
        endMust('target', 'not a «quantity»', notByLineage('quantity'));
        break;
      case 'subcollectionOf':
        exactlyOne('target');
        endMust('source', 'a «collective»', byLineage('collective'));
        endMust('target', 'a «collective»', byLineage('collective'));
        break;
      case 'containment':
        exactlyOne('target');
        endMust('source', 'not a «quantity»', notByLineage('quantity'));
        endMust('target', 'a «quantity»', byLineage('quantity'));
        break;
      case 'subquantityOf':
        exactlyOne('source');
        exactlyOne('target');
        endMust('source', 'a «quantity»', byLineage('quantity'));
        endMust('target', 'a «quantity»', byLineage('quantity'));
        break;
    }
  };

  for (const e of index.elements) {
    switch (e.type) {
      case 'class': {
        const cls = index.classes.get(e.id);
        if (cls) checkClass(cls);
        break;
      }
      case 'generalization': {
        const g = index.generalizations.get(e.id);
        if (g) checkGeneralization(g);
        break;
      }
      case 'association': {
        const a = index.associations.get(e.id);
        if (a) checkAssociation(a);
        break;
      }
      default:
        break;
    }
  }

  for (const id of index.duplicateIds) {
    problems.push(validationError(id, 'InvalidReference', `element id '${id}' is declared more than once`));
  }

  // A class off every cycle sums the same on any path, so its sum is kept.
  const settledSums = new Map<ElementId, number>();
  const mediationSum = (id: ElementId, path: Set<ElementId>): number => {
    const settled = settledSums.get(id);
    if (settled !== undefined) return settled;
    if (path.has(id)) return 0;
    path.add(id);
    try {
      let sum = infos.get(id)?.mediationLower ?? 0;
      for (const g of parentGeneralizations(graph, id)) {
        const sums = g.targetIds.map((t) => mediationSum(t, path));
        if (sums.length === 0) continue;
        sum += g.isDisjoint ? Math.min(...sums) : sums.reduce((acc, v) => acc + v, 0);
      }
      if (!isSubtypeOf(graph, id, id)) settledSums.set(id, sum);
      return sum;
    } finally {
      path.delete(id);
    }
  };

  for (const cls of index.classes.values()) {
    const s = cls.stereotype;
    const info = infos.get(cls.id);
    if (s === undefined || !info) continue;

    if (requiresIdentity(s) && (info.identity.min !== 1 || info.identity.max !== 1)) {
      problems.push(
        validationError(
          cls.id,
          'InvalidIdentity',
          `element does not have exactly one identity provider (found ${formatInterval(info.identity)})`,
        ),
      );
    }

    if (s === 'role' && mediationSum(cls.id, new Set()) === 0) {
      problems.push(validationError(cls.id, 'InvalidRole', '«role» must be connected to a «mediation»'));
    }

    if (!cls.isAbstract && lineageHas(graph, cls.id, (x) => x === 'relator')) {
      const sum = mediationSum(cls.id, new Set());
      if (sum < 2) {
        problems.push(
          validationError(cls.id, 'InvalidRelator', `«relator» must mediate at least two entities (found ${sum})`),
        );
      }
    }

    if (s === 'phase' && !info.inDisjointCompleteSet) {
      problems.push(
        validationError(cls.id, 'InvalidPhase', '«phase» must belong to a disjoint and complete generalization set'),
      );
    }

    if (isNonSortal(s) && !cls.isAbstract) {
      problems.push(validationError(cls.id, 'InvalidNonabstractMixin', `${guillemets(s)} must be abstract`));
    }

    if (isAspect(s) && !info.characterized) {
      problems.push(
        validationError(cls.id, 'InvalidMissingCharacterization', `${guillemets(s)} must be the target of a «characterization»`),
      );
    }
  }

  return problems;
}
