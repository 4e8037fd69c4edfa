import { DeclaredReference } from '../types';

/**
 * Every cross-reference the geometric units make.
 *
 * `eager` entries are value imports at the top of a unit and must point to a
 * strictly lower layer. `deferred` entries are bound inside the named method.
 * Type-only imports are erased on compile and are not listed.
 */
export const DECLARED_REFERENCES: readonly DeclaredReference[] = [
  { from: 'Scheme', to: 'Spec', kind: 'deferred', site: 'Scheme.baseScheme' },
  { from: 'Scheme', to: 'Homset', kind: 'deferred', site: 'Scheme.hom' },

  { from: 'Spec', to: 'Scheme', kind: 'eager' },
  { from: 'AmbientSpace', to: 'Scheme', kind: 'eager' },
  { from: 'AmbientSpace', to: 'Point', kind: 'eager' },
  { from: 'Morphism', to: 'Scheme', kind: 'eager' },
  { from: 'Morphism', to: 'Homset', kind: 'deferred', site: 'Morphism.parent' },

  { from: 'ToricMorphism', to: 'Morphism', kind: 'eager' },
  { from: 'Glue', to: 'Morphism', kind: 'eager' },
  { from: 'Glue', to: 'Scheme', kind: 'eager' },

  { from: 'Homset', to: 'Morphism', kind: 'eager' },
  { from: 'Homset', to: 'Scheme', kind: 'eager' },

  { from: 'AffineScheme', to: 'Scheme', kind: 'eager' },
  { from: 'AffineScheme', to: 'Spec', kind: 'eager' },
  { from: 'ProjectiveScheme', to: 'AmbientSpace', kind: 'eager' },
  { from: 'ToricVariety', to: 'AmbientSpace', kind: 'eager' },
  { from: 'ToricVariety', to: 'ToricMorphism', kind: 'eager' },
  { from: 'ToricVariety', to: 'ToricDivisor', kind: 'deferred', site: 'ToricVariety.divisor' },

  { from: 'AlgebraicScheme', to: 'Scheme', kind: 'eager' },
  { from: 'AlgebraicScheme', to: 'AmbientSpace', kind: 'eager' },
  { from: 'AlgebraicScheme', to: 'Homset', kind: 'eager' },
  { from: 'FanoToricVariety', to: 'ToricVariety', kind: 'eager' },

  { from: 'Hypersurface', to: 'AlgebraicScheme', kind: 'eager' },

  { from: 'Divisor', to: 'Scheme', kind: 'eager' },
  { from: 'Divisor', to: 'DivisorGroup', kind: 'deferred', site: 'Divisor.parent' },

  { from: 'DivisorGroup', to: 'Divisor', kind: 'eager' },

  { from: 'ToricDivisor', to: 'Divisor', kind: 'eager' },
  { from: 'ToricDivisor', to: 'DivisorGroup', kind: 'eager' },
  { from: 'ToricDivisor', to: 'ToricVariety', kind: 'eager' }
];
