import {
  CLASS_STEREOTYPES,
  canSpecialize,
  guillemets,
  isAntiRigid,
  isIdentityProvider,
  isNonSortal,
  isRigid,
  parseAssociationStereotype,
  parseClassStereotype,
  rigidityOf,
} from '../stereotypes';

describe('class stereotypes', () => {
  test('parses known literals and rejects the rest', () => {
    expect(parseClassStereotype('kind')).toBe('kind');
    expect(parseClassStereotype('roleMixin')).toBe('roleMixin');
    expect(parseClassStereotype('')).toBeUndefined();
    expect(parseClassStereotype('Kind')).toBeUndefined();
    expect(parseClassStereotype('event')).toBeUndefined();
  });

  test('identity providers are the ultimate sortals and aspects', () => {
    const providers = CLASS_STEREOTYPES.filter(isIdentityProvider);
    expect(providers).toEqual(['kind', 'collective', 'quantity', 'relator', 'mode', 'quality']);
  });

  test('non-sortals are the mixin family', () => {
    expect(CLASS_STEREOTYPES.filter(isNonSortal)).toEqual(['category', 'phaseMixin', 'roleMixin', 'mixin']);
  });

  test('rigidity', () => {
    expect(rigidityOf('mixin')).toBe('semiRigid');
    expect(isRigid('subkind')).toBe(true);
    expect(isAntiRigid('phase')).toBe(true);
    expect(isRigid('mixin')).toBe(false);
    expect(isAntiRigid('mixin')).toBe(false);
  });
});

describe('legal subtyping', () => {
  test('sortals specialize identity providers', () => {
    expect(canSpecialize('subkind', 'kind')).toBe(true);
    expect(canSpecialize('phase', 'phase')).toBe(true);
    expect(canSpecialize('role', 'roleMixin')).toBe(true);
    expect(canSpecialize('role', 'phaseMixin')).toBe(false);
  });

  test('identity providers only specialize category or mixin', () => {
    expect(canSpecialize('kind', 'category')).toBe(true);
    expect(canSpecialize('kind', 'subkind')).toBe(false);
    expect(canSpecialize('kind', 'kind')).toBe(false);
    expect(canSpecialize('relator', 'mixin')).toBe(true);
  });

  test('mixins never specialize sortals', () => {
    expect(canSpecialize('category', 'kind')).toBe(false);
    expect(canSpecialize('roleMixin', 'phaseMixin')).toBe(true);
    expect(canSpecialize('phaseMixin', 'roleMixin')).toBe(false);
  });
});

describe('association stereotypes', () => {
  test('empty text is a plain association', () => {
    expect(parseAssociationStereotype('')).toBe('none');
    expect(parseAssociationStereotype('none')).toBe('none');
    expect(parseAssociationStereotype('mediation')).toBe('mediation');
    expect(parseAssociationStereotype('material')).toBeUndefined();
  });

  test('guillemets', () => {
    expect(guillemets('kind')).toBe('«kind»');
  });
});
