import { EntityTypeName, LayerNumber } from '../types';

export interface LayerRow {
  layer: LayerNumber;
  types: readonly EntityTypeName[];
}

const rows: LayerRow[] = [
  { layer: 1, types: ['Scheme', 'Point'] },
  { layer: 2, types: ['Spec', 'AmbientSpace', 'Morphism'] },
  { layer: 3, types: ['ToricMorphism', 'Glue'] },
  { layer: 4, types: ['Homset'] },
  { layer: 5, types: ['AffineScheme', 'ProjectiveScheme', 'ToricVariety'] },
  { layer: 6, types: ['AlgebraicScheme', 'FanoToricVariety'] },
  { layer: 7, types: ['Hypersurface'] },
  { layer: 8, types: ['Divisor'] },
  { layer: 9, types: ['DivisorGroup'] },
  { layer: 10, types: ['ToricDivisor'] }
];

/**
 * Load order of the geometric entity family.
 *
 * A type may eagerly reference only types in strictly lower layers. Anything
 * else goes through a deferred reference declared inside the method that
 * needs it.
 */
export const LAYER_TABLE: readonly LayerRow[] = Object.freeze(rows);
